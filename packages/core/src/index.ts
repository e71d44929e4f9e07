// Contracts
export * from "./contracts/types.js"
export * from "./contracts/errors.js"
export * from "./contracts/registry.js"
export * from "./contracts/service.js"
export * from "./contracts/controller.js"
export {
  applyListDefaults,
  buildPaginatedResult,
  isSortDirection,
  normalizeDirection,
  pageOffset,
} from "./contracts/list-request.js"

// Resource framework
export {
  BaseResourceService,
  MAX_SEARCH_LENGTH,
  MIN_SEARCH_LENGTH,
  type BaseResourceOptions,
} from "./resource/base-service.js"
export {
  ResourceService,
  parseInput,
  definedColumns,
  type FilterCondition,
  type ResourceDefinition,
} from "./resource/resource-service.js"
export {
  BaseResourceController,
  DEFAULT_PAGINATION_CONFIG,
  toErrorStatus,
  type ActionPermissions,
  type Authorizer,
  type BaseControllerOptions,
  type ErrorStatus,
} from "./resource/base-controller.js"
export {
  ResourceController,
  MOUNTABLE_CONTROLLER,
  defaultActionPermissions,
  type ControllerSettings,
  type MountableController,
  type ResourceControllerOptions,
} from "./resource/resource-controller.js"

// Persistence
export {
  openDatabase,
  isForeignKeyViolation,
  isUniqueViolation,
  type SqliteDatabase,
  type SqlValue,
} from "./persistence/database.js"
export {
  SqliteRepository,
  type Condition,
  type QueryOptions,
  type Repository,
  type TableMapping,
} from "./persistence/repository.js"
export {
  applyMigrations,
  calculateChecksum,
  getAppliedMigrations,
  getMigrationFiles,
  type MigrationReport,
} from "./persistence/migrations.js"

// Resources
export { BookService } from "./books/service.js"
export { BookController } from "./books/controller.js"
export { UserService } from "./users/service.js"
export { UserController } from "./users/controller.js"
export { RoleService } from "./roles/service.js"
export { RoleController } from "./roles/controller.js"
export { roleSlug } from "./roles/definition.js"

// RBAC
export {
  RBACAdapter,
  RBACServiceImpl,
  PermissionMatrixServiceImpl,
  PERMISSION_MATRIX_SERVICE,
  bootstrapRBAC,
  seedDefaults,
  permissionMatrixEndpoints,
  PermissionRegistry,
  defaultPermissionRegistry,
  slugMatches,
  type RBACService,
  type PermissionMatrixService,
} from "./rbac/index.js"

// App
export { loadConfig, ConfigError, DEFAULT_APP_CONFIG, type AppConfig } from "./config.js"
export {
  createApp,
  createServices,
  userIdFromHeader,
  type AppServices,
  type CreateAppOptions,
} from "./app.js"
