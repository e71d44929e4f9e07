/**
 * Permission Matrix Service
 *
 * The role x permission grid and the operations that edit it: single
 * assignment and revocation, sequential bulk edits, an atomic full sync for
 * one role, and upserting the gate catalog.
 *
 * @packageDocumentation
 */

import {
  ContractError,
  InvalidArgumentError,
  NotFoundError,
  PartialFailureError,
  TransactionFailureError,
  errorMessage,
} from "../contracts/errors.js"
import type { ContractDefinition } from "../contracts/registry.js"
import type {
  BulkPermissionAction,
  BulkPermissionRequest,
  BulkResult,
  GateSyncResult,
  Permission,
  PermissionDefinition,
  PermissionGroup,
  PermissionMatrix,
  RoleWithPermissions,
} from "../contracts/types.js"
import { BaseResourceService } from "../resource/base-service.js"
import { GATE_PERMISSIONS } from "./catalog.js"
import type { RBACAdapter } from "./sqlite-adapter.js"

export interface PermissionMatrixService {
  getPermissionMatrix(): Promise<PermissionMatrix>
  assignPermissionToRole(roleId: number, permissionId: number): Promise<void>
  revokePermissionFromRole(roleId: number, permissionId: number): Promise<void>
  bulkAssignPermissions(request: BulkPermissionRequest): Promise<BulkResult>
  syncRolePermissions(roleId: number, permissionIds: number[]): Promise<void>
  syncPermissionsFromGates(): Promise<GateSyncResult>
  validatePermissionAssignment(roleId: number, permissionId: number): Promise<void>
  getRolePermissions(roleId: number): Promise<Permission[]>
  getPermissionsByCategory(): Promise<PermissionGroup[]>
}

export const PERMISSION_MATRIX_SERVICE: ContractDefinition<PermissionMatrixService> =
  {
    name: "PermissionMatrixService",
    kind: "service",
    operations: [
      "getPermissionMatrix",
      "assignPermissionToRole",
      "revokePermissionFromRole",
      "bulkAssignPermissions",
      "syncRolePermissions",
      "syncPermissionsFromGates",
      "validatePermissionAssignment",
      "getRolePermissions",
      "getPermissionsByCategory",
    ],
  }

function isBulkPermissionAction(action: string): action is BulkPermissionAction {
  return action === "assign" || action === "revoke"
}

/**
 * Group permissions by category, keeping first-seen order
 */
export function groupByCategory(permissions: Permission[]): PermissionGroup[] {
  const groups = new Map<string, Permission[]>()
  for (const permission of permissions) {
    const group = groups.get(permission.category)
    if (group) {
      group.push(permission)
    } else {
      groups.set(permission.category, [permission])
    }
  }
  return [...groups].map(([category, items]) => ({
    category,
    permissions: items,
  }))
}

/**
 * PermissionMatrixServiceImpl
 *
 * TESTING CHECKLIST:
 * - getPermissionMatrix syncs the gate catalog first
 * - roles ordered by level DESC, permissions by category/action ASC
 * - assigning twice leaves one active row
 * - bulk stops at the first failure; earlier items stay
 * - syncRolePermissions leaves the previous set intact when it fails
 */
export class PermissionMatrixServiceImpl implements PermissionMatrixService {
  private adapter: RBACAdapter
  private gateCatalog: readonly PermissionDefinition[]
  private bulk: BaseResourceService

  constructor(
    adapter: RBACAdapter,
    gateCatalog: readonly PermissionDefinition[] = GATE_PERMISSIONS,
  ) {
    this.adapter = adapter
    this.gateCatalog = gateCatalog
    this.bulk = new BaseResourceService({ tableName: "role_permissions" })
  }

  // ============================================
  // MATRIX
  // ============================================

  async getPermissionMatrix(): Promise<PermissionMatrix> {
    try {
      await this.syncPermissionsFromGates()
    } catch (error) {
      throw new TransactionFailureError(
        `failed to sync permissions from gates: ${errorMessage(error)}`,
        error,
      )
    }

    const roles = await this.adapter.listRoles({ activeOnly: true })
    const permissions = await this.adapter.listPermissions({ activeOnly: true })
    const assignments = await this.adapter.listActiveAssignments()

    const activePermissionIds = new Set(permissions.map((p) => p.id))
    const matrix: Record<number, number[]> = {}
    for (const role of roles) {
      matrix[role.id] = []
    }
    for (const { role_id, permission_id } of assignments) {
      const row = matrix[role_id]
      if (row && activePermissionIds.has(permission_id)) {
        row.push(permission_id)
      }
    }

    const rolesWithPermissions: RoleWithPermissions[] = roles.map((role) => {
      const ids = matrix[role.id] ?? []
      return {
        ...role,
        permission_ids: ids,
        permission_count: ids.length,
      }
    })

    const roleCounts = await this.adapter.countRoles()
    const permissionCounts = await this.adapter.countPermissions()

    return {
      roles: rolesWithPermissions,
      permissions: groupByCategory(permissions),
      matrix,
      stats: {
        total_roles: roleCounts.total,
        total_permissions: permissionCounts.total,
        total_assignments: Object.values(matrix).reduce((sum, ids) => sum + ids.length, 0),
        active_roles: roleCounts.active,
        active_permissions: permissionCounts.active,
      },
    }
  }

  // ============================================
  // ASSIGNMENT
  // ============================================

  async assignPermissionToRole(
    roleId: number,
    permissionId: number,
  ): Promise<void> {
    await this.validatePermissionAssignment(roleId, permissionId)

    const existing = await this.adapter.getRolePermission(roleId, permissionId)
    if (existing?.is_active) return
    if (existing) {
      await this.adapter.reactivateRolePermission(roleId, permissionId)
      return
    }
    await this.adapter.insertRolePermission(roleId, permissionId)
  }

  async revokePermissionFromRole(
    roleId: number,
    permissionId: number,
  ): Promise<void> {
    await this.adapter.deleteRolePermission(roleId, permissionId)
  }

  /**
   * Not atomic: items processed before a failure stay applied
   */
  async bulkAssignPermissions(
    request: BulkPermissionRequest,
  ): Promise<BulkResult> {
    const { action } = request
    if (!isBulkPermissionAction(action)) {
      throw new InvalidArgumentError(`invalid action: ${action}`, "action")
    }
    this.bulk.validateBulkOperation(request.permission_ids)

    let succeeded = 0
    for (const permissionId of request.permission_ids) {
      try {
        if (action === "assign") {
          await this.assignPermissionToRole(request.role_id, permissionId)
        } else {
          await this.revokePermissionFromRole(request.role_id, permissionId)
        }
      } catch (error) {
        throw new PartialFailureError(
          succeeded,
          request.permission_ids.length,
          bulkItemError(action, permissionId, error),
        )
      }
      succeeded++
    }

    return { succeeded, attempted: request.permission_ids.length }
  }

  async syncRolePermissions(
    roleId: number,
    permissionIds: number[],
  ): Promise<void> {
    const role = await this.adapter.getRole(roleId)
    if (!role) {
      throw new NotFoundError(`role ${roleId} not found`)
    }

    const unique = [...new Set(permissionIds)]
    try {
      this.adapter.replaceRolePermissions(roleId, unique)
    } catch (error) {
      throw new TransactionFailureError(
        `failed to sync role permissions: ${errorMessage(error)}`,
        error,
      )
    }
  }

  async syncPermissionsFromGates(): Promise<GateSyncResult> {
    let created = 0
    let updated = 0
    for (const definition of this.gateCatalog) {
      const result = await this.adapter.upsertPermission(definition)
      if (result.created) {
        created++
      } else {
        updated++
      }
    }
    return { created, updated }
  }

  async validatePermissionAssignment(
    roleId: number,
    permissionId: number,
  ): Promise<void> {
    const role = await this.adapter.getRole(roleId)
    if (!role?.is_active) {
      throw new NotFoundError("role not found or inactive")
    }
    const permission = await this.adapter.getPermission(permissionId)
    if (!permission?.is_active) {
      throw new NotFoundError("permission not found or inactive")
    }
  }

  // ============================================
  // QUERIES
  // ============================================

  async getRolePermissions(roleId: number): Promise<Permission[]> {
    const role = await this.adapter.getRole(roleId)
    if (!role?.is_active) {
      throw new NotFoundError(`role ${roleId} not found`)
    }
    return this.adapter.getPermissionsForRole(roleId)
  }

  async getPermissionsByCategory(): Promise<PermissionGroup[]> {
    return groupByCategory(
      await this.adapter.listPermissions({ activeOnly: true }),
    )
  }
}

/**
 * One failed item of a bulk edit, keeping the inner error's code and status
 */
function bulkItemError(
  action: BulkPermissionAction,
  permissionId: number,
  failure: unknown,
): Error {
  const message = `failed to ${action} permission ${permissionId}: ${errorMessage(failure)}`
  if (failure instanceof ContractError) {
    return new ContractError(failure.code, message, failure.status)
  }
  return new Error(message)
}
