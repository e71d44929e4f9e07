/**
 * Role-based access control for the admin resources.
 *
 * Roles carry a numeric level and are granted permissions through a
 * role x permission matrix. Users hold roles; a permission check passes when
 * any held role grants a matching slug.
 *
 * ## Quick Start
 *
 * ```ts title="rbac-setup.ts"
 * import {
 *   RBACAdapter,
 *   RBACServiceImpl,
 *   PermissionMatrixServiceImpl,
 *   bootstrapRBAC,
 *   permissionMatrixEndpoints,
 * } from "@shelfdesk/core/rbac"
 *
 * const adapter = new RBACAdapter(db)
 * await bootstrapRBAC(adapter)
 *
 * const rbac = new RBACServiceImpl(adapter)
 * const matrix = new PermissionMatrixServiceImpl(adapter)
 *
 * app.route("/api/permissions", permissionMatrixEndpoints(matrix, { authorizer: rbac }))
 *
 * await rbac.checkPermission(userId, "books.view")
 * ```
 *
 * ## Slugs
 *
 * ```
 * books.view   books_view   books.*   *
 * ```
 *
 * Dotted and underscored spellings are interchangeable for checks.
 *
 * @packageDocumentation
 */

export { RBACAdapter } from "./sqlite-adapter.js"
export {
  MANAGE_USERS_PERMISSION,
  RBACServiceImpl,
  SUPER_ADMIN_ROLE,
  type RBACService,
} from "./service.js"
export {
  PermissionMatrixServiceImpl,
  PERMISSION_MATRIX_SERVICE,
  groupByCategory,
  type PermissionMatrixService,
} from "./matrix-service.js"
export {
  bootstrapRBAC,
  seedDefaults,
  DEFAULT_ROLES,
  DEFAULT_ROLE_PERMISSIONS,
  ROLE_HIERARCHY,
  type BootstrapOptions,
  type BootstrapResult,
} from "./bootstrap.js"
export {
  permissionMatrixEndpoints,
  MATRIX_READ_PERMISSION,
  MATRIX_WRITE_PERMISSION,
  type MatrixEndpointOptions,
} from "./admin-endpoints.js"
export {
  PermissionRegistry,
  STANDARD_PERMISSIONS,
  defaultPermissionRegistry,
  generateCustomPermissionSlug,
  generatePermissionSlug,
  type CustomPermission,
  type ResourcePermissionConfig,
  type StandardPermission,
} from "./permission-registry.js"
export {
  GATE_PERMISSIONS,
  SERVICES,
  SERVICE_ACTIONS,
  buildPermissionSlug,
  getActionDisplayName,
  getServiceActions,
  getServiceDisplayName,
  servicePermissions,
  type ServiceAction,
  type ServiceName,
} from "./catalog.js"
export {
  hasMatchingSlug,
  parsePermissionSlug,
  slugAliases,
  slugMatches,
  type ParsedSlug,
  type SlugSeparator,
} from "./slug.js"
export type * from "./types.js"
