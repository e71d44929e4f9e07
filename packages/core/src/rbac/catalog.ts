/**
 * Static permission catalogs.
 *
 * Two slug conventions live side by side: the gate catalog uses
 * `resource.action`, the service catalog `service_action`. Both are seeded
 * as-is; `slug.ts` treats them as aliases when checking access.
 *
 * @packageDocumentation
 */

import type { PermissionDefinition } from "../contracts/types.js"

// ============================================
// SERVICE CATALOG (service_action)
// ============================================

export const SERVICE_ACTIONS = [
  "create",
  "read",
  "update",
  "delete",
  "export",
  "bulk_update",
  "bulk_delete",
  "manage",
  "view",
] as const

export type ServiceAction = (typeof SERVICE_ACTIONS)[number]

export const SERVICES = [
  "books",
  "users",
  "roles",
  "permissions",
  "reports",
  "system",
  "bundles",
] as const

export type ServiceName = (typeof SERVICES)[number]

const CRUD_EXPORT_BULK: ServiceAction[] = [
  "create",
  "read",
  "update",
  "delete",
  "export",
  "bulk_update",
  "bulk_delete",
  "view",
]

const SERVICE_ACTION_MAP: Record<ServiceName, ServiceAction[]> = {
  books: CRUD_EXPORT_BULK,
  bundles: CRUD_EXPORT_BULK,
  users: ["create", "read", "update", "delete", "export", "view", "manage"],
  roles: ["create", "read", "update", "delete", "view", "manage"],
  permissions: ["read", "update", "view", "manage"],
  reports: ["view", "export"],
  system: ["view", "manage"],
}

const SERVICE_DISPLAY_NAMES: Record<ServiceName, string> = {
  books: "Books Management",
  users: "User Management",
  roles: "Role Management",
  permissions: "Permission Management",
  reports: "Reports & Analytics",
  system: "System Administration",
  bundles: "SME Management",
}

const ACTION_DISPLAY_NAMES: Record<ServiceAction, string> = {
  create: "Create",
  read: "Read/List",
  update: "Update/Edit",
  delete: "Delete",
  export: "Export",
  bulk_update: "Bulk Update",
  bulk_delete: "Bulk Delete",
  manage: "Full Management",
  view: "View",
}

export function getServiceActions(service: ServiceName): ServiceAction[] {
  return [...SERVICE_ACTION_MAP[service]]
}

export function getServiceDisplayName(service: ServiceName): string {
  return SERVICE_DISPLAY_NAMES[service]
}

export function getActionDisplayName(action: ServiceAction): string {
  return ACTION_DISPLAY_NAMES[action]
}

export function buildPermissionSlug(
  service: ServiceName,
  action: ServiceAction,
): string {
  return `${service}_${action}`
}

/**
 * Every service/action pair as a permission definition
 */
export function servicePermissions(): PermissionDefinition[] {
  return SERVICES.flatMap((service) =>
    SERVICE_ACTION_MAP[service].map((action) => {
      const actionName = getActionDisplayName(action)
      return {
        name: `${actionName} ${getServiceDisplayName(service)}`,
        slug: buildPermissionSlug(service, action),
        category: service,
        resource: service,
        action,
        description: `${actionName} ${service} in the system`,
      }
    }),
  )
}

// ============================================
// GATE CATALOG (resource.action)
// ============================================

function gate(
  name: string,
  resource: string,
  action: string,
  description: string,
): PermissionDefinition {
  return {
    name,
    slug: `${resource}.${action}`,
    category: resource,
    resource,
    action,
    description,
  }
}

export const GATE_PERMISSIONS: readonly PermissionDefinition[] = [
  gate("View Any Books", "books", "viewAny", "View any books in the system"),
  gate("View Books", "books", "view", "View specific books"),
  gate("Create Books", "books", "create", "Create new books"),
  gate("Update Books", "books", "update", "Update existing books"),
  gate("Delete Books", "books", "delete", "Delete books"),
  gate("Borrow Books", "books", "borrow", "Borrow books"),
  gate("Return Books", "books", "return", "Return books"),
  gate("Manage Books", "books", "manage", "Full book management"),
  gate("Export Books", "books", "export", "Export book data"),

  gate("View Any Users", "users", "viewAny", "View any users in the system"),
  gate("View Users", "users", "view", "View specific users"),
  gate("Create Users", "users", "create", "Create new users"),
  gate("Update Users", "users", "update", "Update existing users"),
  gate("Delete Users", "users", "delete", "Delete users"),
  gate("Impersonate Users", "users", "impersonate", "Impersonate other users"),
  gate("Manage Users", "users", "manage", "Full user management"),

  gate("Manage System", "system", "manage", "Full system management"),
  gate("Backup System", "system", "backup", "Create system backups"),
  gate("Configure System", "system", "configure", "Configure system settings"),
  gate("View Reports", "reports", "view", "View reports and analytics"),
  gate("Export Reports", "reports", "export", "Export reports"),
]
