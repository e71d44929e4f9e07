/**
 * RBAC Bootstrap
 *
 * Seeds the default roles, their hierarchy, both permission catalogs and the
 * default grants. Every write is an upsert keyed by slug, so running it again
 * changes nothing.
 *
 * @packageDocumentation
 */

import { servicePermissions } from "./catalog.js"
import { PermissionMatrixServiceImpl } from "./matrix-service.js"
import {
  defaultPermissionRegistry,
  type PermissionRegistry,
} from "./permission-registry.js"
import { SUPER_ADMIN_ROLE } from "./service.js"
import type { RBACAdapter } from "./sqlite-adapter.js"
import type { UpsertRoleParams } from "./types.js"

export const DEFAULT_ROLES: readonly UpsertRoleParams[] = [
  {
    name: "Super Admin",
    slug: SUPER_ADMIN_ROLE,
    description: "Unrestricted access to every resource",
    level: 100,
  },
  {
    name: "Admin",
    slug: "admin",
    description: "Manages books, users and reports",
    level: 80,
  },
  {
    name: "Librarian",
    slug: "librarian",
    description: "Maintains the catalog",
    level: 60,
  },
  {
    name: "Moderator",
    slug: "moderator",
    description: "Handles lending and catalog edits",
    level: 40,
  },
  {
    name: "Member",
    slug: "member",
    description: "Browses and borrows books",
    level: 20,
  },
  {
    name: "Guest",
    slug: "guest",
    description: "Read-only browsing",
    level: 10,
  },
]

/**
 * Child slug to parent slug
 */
export const ROLE_HIERARCHY: Readonly<Record<string, string>> = {
  admin: "librarian",
  librarian: "moderator",
  moderator: "member",
  member: "guest",
}

const BOOKS_READ = ["books.viewAny", "books.view"]
const BOOKS_LENDING = ["books.borrow", "books.return"]
const BOOKS_EDIT = ["books.create", "books.update"]
const BOOKS_MANAGE = [
  ...BOOKS_READ,
  ...BOOKS_EDIT,
  "books.delete",
  "books.manage",
  "books.export",
]

export const DEFAULT_ROLE_PERMISSIONS: Readonly<Record<string, string[]>> = {
  admin: [
    ...BOOKS_MANAGE,
    "users.viewAny",
    "users.view",
    "users.create",
    "users.update",
    "users.manage",
    "roles.viewAny",
    "roles.view",
    "roles.assign",
    "reports.view",
    "reports.export",
    "reports.create",
  ],
  librarian: [
    ...BOOKS_MANAGE,
    "users.viewAny",
    "users.view",
    "reports.view",
    "reports.export",
  ],
  moderator: [
    ...BOOKS_READ,
    ...BOOKS_EDIT,
    ...BOOKS_LENDING,
    "users.view",
    "reports.view",
  ],
  member: [...BOOKS_READ, ...BOOKS_LENDING],
  guest: [...BOOKS_READ],
}

export interface BootstrapOptions {
  /** Extra per-resource permissions to seed alongside the catalogs */
  registry?: PermissionRegistry
}

export interface BootstrapResult {
  roles: number
  permissions: number
  assignments: number
}

/**
 * Seed roles, permissions and default grants
 *
 * TESTING CHECKLIST:
 * - six roles with the fixed levels
 * - parent_id follows ROLE_HIERARCHY
 * - super-admin holds every active permission
 * - unknown default slugs are skipped with a warning
 * - a second run leaves counts unchanged
 */
export async function bootstrapRBAC(
  adapter: RBACAdapter,
  options: BootstrapOptions = {},
): Promise<BootstrapResult> {
  const matrix = new PermissionMatrixServiceImpl(adapter)

  const roleIds = new Map<string, number>()
  for (const params of DEFAULT_ROLES) {
    const role = await adapter.upsertRole(params)
    roleIds.set(role.slug, role.id)
  }

  for (const [child, parent] of Object.entries(ROLE_HIERARCHY)) {
    const childId = roleIds.get(child)
    const parentId = roleIds.get(parent)
    if (childId === undefined || parentId === undefined) continue
    await adapter.setRoleParent(childId, parentId)
  }

  for (const definition of servicePermissions()) {
    await adapter.upsertPermission(definition)
  }
  for (const definition of options.registry?.toDefinitions() ?? []) {
    await adapter.upsertPermission(definition)
  }
  await matrix.syncPermissionsFromGates()

  const permissions = await adapter.listPermissions({ activeOnly: true })

  const superAdminId = roleIds.get(SUPER_ADMIN_ROLE)
  if (superAdminId !== undefined) {
    for (const permission of permissions) {
      await matrix.assignPermissionToRole(superAdminId, permission.id)
    }
  }

  for (const [roleSlug, slugs] of Object.entries(DEFAULT_ROLE_PERMISSIONS)) {
    const roleId = roleIds.get(roleSlug)
    if (roleId === undefined) continue

    for (const slug of slugs) {
      const permission = await adapter.getPermissionBySlug(slug)
      if (!permission) {
        console.warn(`bootstrap: permission ${slug} not found, skipping for ${roleSlug}`)
        continue
      }
      await matrix.assignPermissionToRole(roleId, permission.id)
    }
  }

  return {
    roles: roleIds.size,
    permissions: permissions.length,
    assignments: await adapter.countActiveAssignments(),
  }
}

/**
 * Seed with the application's own resource registry. This is what the
 * seed command and `--seed` run.
 */
export async function seedDefaults(adapter: RBACAdapter): Promise<BootstrapResult> {
  return bootstrapRBAC(adapter, { registry: defaultPermissionRegistry() })
}
