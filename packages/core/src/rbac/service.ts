/**
 * RBAC Service Implementation
 *
 * Authorization decisions for users and the user-role assignments they rest
 * on. Permission checks accept both slug conventions and wildcards.
 *
 * @packageDocumentation
 */

import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
} from "../contracts/errors.js"
import type { Role, UserRole } from "../contracts/types.js"
import { hasMatchingSlug, slugMatches } from "./slug.js"
import type { RBACAdapter } from "./sqlite-adapter.js"
import type { AssignRoleParams } from "./types.js"

export const SUPER_ADMIN_ROLE = "super-admin"
export const MANAGE_USERS_PERMISSION = "users.manage"

export interface RBACService {
  getUserRoles(userId: number): Promise<Role[]>
  getUserPermissions(userId: number): Promise<string[]>
  checkPermission(userId: number, permission: string): Promise<boolean>
  checkPermissions(
    userId: number,
    permissions: string[],
  ): Promise<Record<string, boolean>>
  hasRole(userId: number, roleSlug: string): Promise<boolean>
  getHighestLevel(userId: number): Promise<number>
  canManageUser(actorId: number, targetId: number): Promise<boolean>
  canAccessResource(
    userId: number,
    resource: string,
    action: string,
    ownerId?: number,
  ): Promise<boolean>
  assignRoleToUser(params: AssignRoleParams): Promise<UserRole>
  removeRoleFromUser(userId: number, roleId: number): Promise<void>
}

/**
 * RBAC Service Implementation
 *
 * Super admins (by user flag or by holding the super-admin role) pass every
 * check. Everyone else needs a granted slug that matches.
 *
 * TESTING CHECKLIST:
 * - checkPermission matches `books.view` against `books_view`, `books.*` and `*.view`
 * - canManageUser needs users.manage and a strictly higher level
 * - canAccessResource honors requires_ownership only when every matching grant has it
 * - expired and inactive assignments grant nothing
 * - assignRoleToUser rejects roles at or above the assigner's level
 * - assigning an active role twice is a conflict
 * - removeRoleFromUser deactivates rather than deletes
 */
export class RBACServiceImpl implements RBACService {
  private adapter: RBACAdapter

  constructor(adapter: RBACAdapter) {
    this.adapter = adapter
  }

  private async isSuperAdmin(userId: number): Promise<boolean> {
    const actor = await this.adapter.getActor(userId)
    if (!actor?.is_active) return false
    if (actor.is_super_admin) return true
    return this.hasRole(userId, SUPER_ADMIN_ROLE)
  }

  // ============================================
  // CHECKS
  // ============================================

  async getUserRoles(userId: number): Promise<Role[]> {
    return this.adapter.getUserRoles(userId)
  }

  async getUserPermissions(userId: number): Promise<string[]> {
    return this.adapter.getUserPermissionSlugs(userId)
  }

  async checkPermission(userId: number, permission: string): Promise<boolean> {
    const result = await this.checkPermissions(userId, [permission])
    return result[permission] ?? false
  }

  async checkPermissions(
    userId: number,
    permissions: string[],
  ): Promise<Record<string, boolean>> {
    const result: Record<string, boolean> = {}
    if (await this.isSuperAdmin(userId)) {
      for (const permission of permissions) result[permission] = true
      return result
    }

    const actor = await this.adapter.getActor(userId)
    const granted = actor?.is_active
      ? await this.adapter.getUserPermissionSlugs(userId)
      : []
    for (const permission of permissions) {
      result[permission] = hasMatchingSlug(granted, permission)
    }
    return result
  }

  async hasRole(userId: number, roleSlug: string): Promise<boolean> {
    const roles = await this.adapter.getUserRoles(userId)
    return roles.some((role) => role.slug === roleSlug)
  }

  async getHighestLevel(userId: number): Promise<number> {
    const roles = await this.adapter.getUserRoles(userId)
    return roles.reduce((highest, role) => Math.max(highest, role.level), 0)
  }

  /**
   * Managing another user takes users.manage and a level strictly above
   * the target's highest role
   */
  async canManageUser(actorId: number, targetId: number): Promise<boolean> {
    if (await this.isSuperAdmin(actorId)) return true
    if (!(await this.checkPermission(actorId, MANAGE_USERS_PERMISSION))) {
      return false
    }
    const actorLevel = await this.getHighestLevel(actorId)
    const targetLevel = await this.getHighestLevel(targetId)
    return actorLevel > targetLevel
  }

  /**
   * Access to one record of a resource. A grant whose permission is marked
   * requires_ownership only covers records the user owns; any other
   * matching grant covers them all.
   */
  async canAccessResource(
    userId: number,
    resource: string,
    action: string,
    ownerId?: number,
  ): Promise<boolean> {
    if (await this.isSuperAdmin(userId)) return true

    const actor = await this.adapter.getActor(userId)
    if (!actor?.is_active) return false

    const required = `${resource}.${action}`
    const matching = (await this.adapter.getUserGrantedPermissions(userId)).filter(
      (permission) => slugMatches(permission.slug, required),
    )
    if (matching.length === 0) return false
    if (matching.some((permission) => !permission.requires_ownership)) return true
    return ownerId !== undefined && ownerId === userId
  }

  // ============================================
  // ASSIGNMENT
  // ============================================

  async assignRoleToUser(params: AssignRoleParams): Promise<UserRole> {
    const role = await this.adapter.getRole(params.roleId)
    if (!role?.is_active) {
      throw new NotFoundError("role not found or inactive")
    }

    const user = await this.adapter.getActor(params.userId)
    if (!user) {
      throw new NotFoundError(`user ${params.userId} not found`)
    }

    if (
      params.assignedBy !== undefined &&
      !(await this.isSuperAdmin(params.assignedBy))
    ) {
      const level = await this.getHighestLevel(params.assignedBy)
      if (level <= role.level) {
        throw new AuthorizationError(
          "cannot assign a role at or above your own level",
          403,
        )
      }
    }

    const existing = await this.adapter.getUserRole(params.userId, params.roleId)
    const now = Date.now()
    if (
      existing?.is_active &&
      (existing.expires_at === null || existing.expires_at > now)
    ) {
      throw new ConflictError("role already assigned to user")
    }

    return this.adapter.saveUserRole({
      userId: params.userId,
      roleId: params.roleId,
      assignedBy: params.assignedBy ?? null,
      expiresAt: params.expiresAt ?? null,
      notes: params.notes ?? "",
    })
  }

  async removeRoleFromUser(userId: number, roleId: number): Promise<void> {
    const removed = await this.adapter.deactivateUserRole(userId, roleId)
    if (!removed) {
      throw new NotFoundError("role assignment not found")
    }
  }
}
