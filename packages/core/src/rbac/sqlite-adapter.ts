/**
 * SQLite Adapter for RBAC
 *
 * Database operations for roles, permissions and their assignments.
 * All queries use bound parameters.
 *
 * @packageDocumentation
 */

import type {
  Permission,
  PermissionDefinition,
  Role,
  RolePermission,
  UserRole,
} from "../contracts/types.js"
import type { SqliteDatabase } from "../persistence/database.js"
import { roleFromRow, type RoleRow } from "../roles/definition.js"
import type {
  Actor,
  CountRow,
  PermissionRow,
  RolePermissionRow,
  UpsertRoleParams,
  UserRoleRow,
} from "./types.js"

function permissionFromRow(row: PermissionRow): Permission {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    description: row.description,
    category: row.category,
    resource: row.resource,
    action: row.action,
    is_active: row.is_active === 1,
    requires_ownership: row.requires_ownership === 1,
    can_delegate: row.can_delegate === 1,
    created_at: row.created_at,
    updated_at: row.updated_at,
  }
}

function rolePermissionFromRow(row: RolePermissionRow): RolePermission {
  return {
    role_id: row.role_id,
    permission_id: row.permission_id,
    is_active: row.is_active === 1,
    granted_at: row.granted_at,
    granted_by_id: row.granted_by_id,
    notes: row.notes,
  }
}

function userRoleFromRow(row: UserRoleRow): UserRole {
  return {
    user_id: row.user_id,
    role_id: row.role_id,
    assigned_at: row.assigned_at,
    expires_at: row.expires_at,
    is_active: row.is_active === 1,
    notes: row.notes,
    assigned_by_id: row.assigned_by_id,
  }
}

/**
 * RBACAdapter - SQLite operations for RBAC
 *
 * TESTING CHECKLIST:
 * - Roles list ordered by level DESC, name ASC
 * - Permissions list ordered by category ASC, action ASC
 * - Upserts match on slug
 * - replaceRolePermissions is all-or-nothing
 * - Expired and inactive user-role assignments are ignored
 */
export class RBACAdapter {
  private db: SqliteDatabase

  constructor(database: SqliteDatabase) {
    this.db = database
  }

  /**
   * Run `fn` in a transaction; a throw rolls back every write it made
   */
  transaction<R>(fn: () => R): R {
    return this.db.transaction(fn)()
  }

  // ============================================
  // ROLES
  // ============================================

  async getRole(roleId: number): Promise<Role | undefined> {
    const row = this.db
      .prepare<[number], RoleRow>("SELECT * FROM roles WHERE id = ?")
      .get(roleId)
    return row ? roleFromRow(row) : undefined
  }

  async getRoleBySlug(slug: string): Promise<Role | undefined> {
    const row = this.db
      .prepare<[string], RoleRow>("SELECT * FROM roles WHERE slug = ?")
      .get(slug)
    return row ? roleFromRow(row) : undefined
  }

  async listRoles(options: { activeOnly?: boolean } = {}): Promise<Role[]> {
    const where = options.activeOnly ? "WHERE is_active = 1" : ""
    return this.db
      .prepare<[], RoleRow>(
        `SELECT * FROM roles ${where} ORDER BY level DESC, name ASC`,
      )
      .all()
      .map(roleFromRow)
  }

  /**
   * Insert a role, or refresh name/description/level of the one with the
   * same slug
   */
  async upsertRole(params: UpsertRoleParams): Promise<Role> {
    const now = Date.now()
    this.db
      .prepare<[string, string, string, number, number, number]>(
        `
        INSERT INTO roles (name, slug, description, level, is_active, created_at, updated_at)
        VALUES (?, ?, ?, ?, 1, ?, ?)
        ON CONFLICT(slug) DO UPDATE SET
          name = excluded.name,
          description = excluded.description,
          level = excluded.level,
          updated_at = excluded.updated_at
        `,
      )
      .run(params.name, params.slug, params.description, params.level, now, now)

    const role = await this.getRoleBySlug(params.slug)
    if (!role) {
      throw new Error(`role ${params.slug} missing after upsert`)
    }
    return role
  }

  async setRoleParent(roleId: number, parentId: number | null): Promise<void> {
    this.db
      .prepare<[number | null, number, number]>(
        "UPDATE roles SET parent_id = ?, updated_at = ? WHERE id = ?",
      )
      .run(parentId, Date.now(), roleId)
  }

  async countRoles(): Promise<{ total: number; active: number }> {
    const row = this.db
      .prepare<[], CountRow>(
        "SELECT COUNT(*) AS total, SUM(is_active) AS active FROM roles",
      )
      .get()
    return { total: row?.total ?? 0, active: row?.active ?? 0 }
  }

  // ============================================
  // PERMISSIONS
  // ============================================

  async getPermission(permissionId: number): Promise<Permission | undefined> {
    const row = this.db
      .prepare<[number], PermissionRow>("SELECT * FROM permissions WHERE id = ?")
      .get(permissionId)
    return row ? permissionFromRow(row) : undefined
  }

  async getPermissionBySlug(slug: string): Promise<Permission | undefined> {
    const row = this.db
      .prepare<[string], PermissionRow>("SELECT * FROM permissions WHERE slug = ?")
      .get(slug)
    return row ? permissionFromRow(row) : undefined
  }

  async listPermissions(
    options: { activeOnly?: boolean } = {},
  ): Promise<Permission[]> {
    const where = options.activeOnly ? "WHERE is_active = 1" : ""
    return this.db
      .prepare<[], PermissionRow>(
        `SELECT * FROM permissions ${where} ORDER BY category ASC, action ASC, id ASC`,
      )
      .all()
      .map(permissionFromRow)
  }

  /**
   * Insert a permission, or update the one with the same slug and mark it
   * active again
   */
  async upsertPermission(
    definition: PermissionDefinition,
  ): Promise<{ permission: Permission; created: boolean }> {
    const existing = await this.getPermissionBySlug(definition.slug)
    const now = Date.now()

    if (existing) {
      this.db
        .prepare<[string, string, string, string, string, number, number]>(
          `
          UPDATE permissions
          SET name = ?, category = ?, resource = ?, action = ?, description = ?,
              is_active = 1, updated_at = ?
          WHERE id = ?
          `,
        )
        .run(
          definition.name,
          definition.category,
          definition.resource,
          definition.action,
          definition.description,
          now,
          existing.id,
        )
    } else {
      this.db
        .prepare<[string, string, string, string, string, string, number, number]>(
          `
          INSERT INTO permissions
            (name, slug, category, resource, action, description, is_active,
             requires_ownership, can_delegate, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, ?, 1, 0, 0, ?, ?)
          `,
        )
        .run(
          definition.name,
          definition.slug,
          definition.category,
          definition.resource,
          definition.action,
          definition.description,
          now,
          now,
        )
    }

    const permission = await this.getPermissionBySlug(definition.slug)
    if (!permission) {
      throw new Error(`permission ${definition.slug} missing after upsert`)
    }
    return { permission, created: existing === undefined }
  }

  async countPermissions(): Promise<{ total: number; active: number }> {
    const row = this.db
      .prepare<[], CountRow>(
        "SELECT COUNT(*) AS total, SUM(is_active) AS active FROM permissions",
      )
      .get()
    return { total: row?.total ?? 0, active: row?.active ?? 0 }
  }

  // ============================================
  // ROLE PERMISSIONS
  // ============================================

  async getRolePermission(
    roleId: number,
    permissionId: number,
  ): Promise<RolePermission | undefined> {
    const row = this.db
      .prepare<[number, number], RolePermissionRow>(
        "SELECT * FROM role_permissions WHERE role_id = ? AND permission_id = ?",
      )
      .get(roleId, permissionId)
    return row ? rolePermissionFromRow(row) : undefined
  }

  async insertRolePermission(
    roleId: number,
    permissionId: number,
    grantedBy: number | null = null,
  ): Promise<void> {
    this.db
      .prepare<[number, number, number, number | null]>(
        `
        INSERT INTO role_permissions (role_id, permission_id, is_active, granted_at, granted_by_id, notes)
        VALUES (?, ?, 1, ?, ?, '')
        `,
      )
      .run(roleId, permissionId, Date.now(), grantedBy)
  }

  async reactivateRolePermission(
    roleId: number,
    permissionId: number,
  ): Promise<void> {
    this.db
      .prepare<[number, number, number]>(
        "UPDATE role_permissions SET is_active = 1, granted_at = ? WHERE role_id = ? AND permission_id = ?",
      )
      .run(Date.now(), roleId, permissionId)
  }

  async deleteRolePermission(
    roleId: number,
    permissionId: number,
  ): Promise<boolean> {
    const result = this.db
      .prepare<[number, number]>(
        "DELETE FROM role_permissions WHERE role_id = ? AND permission_id = ?",
      )
      .run(roleId, permissionId)
    return result.changes > 0
  }

  /**
   * Active assignments of active permissions, for every role
   */
  async listActiveAssignments(): Promise<
    { role_id: number; permission_id: number }[]
  > {
    return this.db
      .prepare<[], { role_id: number; permission_id: number }>(
        `
        SELECT rp.role_id, rp.permission_id
        FROM role_permissions rp
        JOIN permissions p ON p.id = rp.permission_id
        WHERE rp.is_active = 1 AND p.is_active = 1
        ORDER BY rp.role_id ASC, rp.permission_id ASC
        `,
      )
      .all()
  }

  async listRolePermissionIds(roleId: number): Promise<number[]> {
    return this.db
      .prepare<[number], { permission_id: number }>(
        `
        SELECT permission_id FROM role_permissions
        WHERE role_id = ? AND is_active = 1
        ORDER BY permission_id ASC
        `,
      )
      .all(roleId)
      .map((row) => row.permission_id)
  }

  async getPermissionsForRole(roleId: number): Promise<Permission[]> {
    return this.db
      .prepare<[number], PermissionRow>(
        `
        SELECT p.* FROM permissions p
        JOIN role_permissions rp ON rp.permission_id = p.id
        WHERE rp.role_id = ? AND rp.is_active = 1 AND p.is_active = 1
        ORDER BY p.category ASC, p.action ASC, p.id ASC
        `,
      )
      .all(roleId)
      .map(permissionFromRow)
  }

  async countActiveAssignments(): Promise<number> {
    const row = this.db
      .prepare<[], { total: number }>(
        "SELECT COUNT(*) AS total FROM role_permissions WHERE is_active = 1",
      )
      .get()
    return row?.total ?? 0
  }

  /**
   * Replace a role's whole permission set in one transaction.
   * If any insert fails the delete is rolled back with it.
   */
  replaceRolePermissions(
    roleId: number,
    permissionIds: number[],
    grantedBy: number | null = null,
  ): void {
    const remove = this.db.prepare<[number]>(
      "DELETE FROM role_permissions WHERE role_id = ?",
    )
    const insert = this.db.prepare<[number, number, number, number | null]>(
      `
      INSERT INTO role_permissions (role_id, permission_id, is_active, granted_at, granted_by_id, notes)
      VALUES (?, ?, 1, ?, ?, '')
      `,
    )

    this.transaction(() => {
      remove.run(roleId)
      const now = Date.now()
      for (const permissionId of permissionIds) {
        insert.run(roleId, permissionId, now, grantedBy)
      }
    })
  }

  // ============================================
  // USERS / USER ROLES
  // ============================================

  async getActor(userId: number): Promise<Actor | undefined> {
    const row = this.db
      .prepare<[number], { id: number; is_active: number; is_super_admin: number }>(
        "SELECT id, is_active, is_super_admin FROM users WHERE id = ?",
      )
      .get(userId)
    if (!row) return undefined
    return {
      id: row.id,
      is_active: row.is_active === 1,
      is_super_admin: row.is_super_admin === 1,
    }
  }

  /**
   * Active roles held through active, unexpired assignments
   */
  async getUserRoles(userId: number, now: number = Date.now()): Promise<Role[]> {
    return this.db
      .prepare<[number, number], RoleRow>(
        `
        SELECT r.* FROM roles r
        JOIN user_roles ur ON ur.role_id = r.id
        WHERE ur.user_id = ? AND ur.is_active = 1 AND r.is_active = 1
        AND (ur.expires_at IS NULL OR ur.expires_at > ?)
        ORDER BY r.level DESC, r.name ASC
        `,
      )
      .all(userId, now)
      .map(roleFromRow)
  }

  /**
   * Active permissions reached through the user's live role assignments
   */
  async getUserGrantedPermissions(
    userId: number,
    now: number = Date.now(),
  ): Promise<Permission[]> {
    return this.db
      .prepare<[number, number], PermissionRow>(
        `
        SELECT DISTINCT p.* FROM permissions p
        JOIN role_permissions rp ON rp.permission_id = p.id
        JOIN roles r ON r.id = rp.role_id
        JOIN user_roles ur ON ur.role_id = r.id
        WHERE ur.user_id = ? AND ur.is_active = 1 AND r.is_active = 1
        AND rp.is_active = 1 AND p.is_active = 1
        AND (ur.expires_at IS NULL OR ur.expires_at > ?)
        ORDER BY p.slug ASC
        `,
      )
      .all(userId, now)
      .map(permissionFromRow)
  }

  async getUserPermissionSlugs(
    userId: number,
    now: number = Date.now(),
  ): Promise<string[]> {
    const permissions = await this.getUserGrantedPermissions(userId, now)
    return permissions.map((permission) => permission.slug)
  }

  async getUserRole(userId: number, roleId: number): Promise<UserRole | undefined> {
    const row = this.db
      .prepare<[number, number], UserRoleRow>(
        "SELECT * FROM user_roles WHERE user_id = ? AND role_id = ?",
      )
      .get(userId, roleId)
    return row ? userRoleFromRow(row) : undefined
  }

  /**
   * Create the assignment, or revive an inactive/expired one in place
   */
  async saveUserRole(assignment: {
    userId: number
    roleId: number
    assignedBy: number | null
    expiresAt: number | null
    notes: string
  }): Promise<UserRole> {
    this.db
      .prepare<[number, number, number, number | null, string, number | null]>(
        `
        INSERT INTO user_roles (user_id, role_id, assigned_at, expires_at, is_active, notes, assigned_by_id)
        VALUES (?, ?, ?, ?, 1, ?, ?)
        ON CONFLICT(user_id, role_id) DO UPDATE SET
          assigned_at = excluded.assigned_at,
          expires_at = excluded.expires_at,
          is_active = 1,
          notes = excluded.notes,
          assigned_by_id = excluded.assigned_by_id
        `,
      )
      .run(
        assignment.userId,
        assignment.roleId,
        Date.now(),
        assignment.expiresAt,
        assignment.notes,
        assignment.assignedBy,
      )

    const saved = await this.getUserRole(assignment.userId, assignment.roleId)
    if (!saved) {
      throw new Error("user role missing after save")
    }
    return saved
  }

  async deactivateUserRole(userId: number, roleId: number): Promise<boolean> {
    const result = this.db
      .prepare<[number, number]>(
        "UPDATE user_roles SET is_active = 0 WHERE user_id = ? AND role_id = ? AND is_active = 1",
      )
      .run(userId, roleId)
    return result.changes > 0
  }
}
