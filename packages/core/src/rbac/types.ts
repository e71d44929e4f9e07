/**
 * RBAC Types - Re-exports contracts and internal types
 *
 * @packageDocumentation
 */

export type {
  Role,
  Permission,
  RolePermission,
  UserRole,
  PermissionMatrix,
  PermissionGroup,
  RoleWithPermissions,
  MatrixStats,
  BulkPermissionRequest,
  BulkPermissionAction,
  BulkResult,
  GateSyncResult,
  PermissionDefinition,
} from "../contracts/types.js"

/**
 * Parameters for upserting a role by slug
 */
export interface UpsertRoleParams {
  name: string
  slug: string
  description: string
  level: number
}

/**
 * Parameters for assigning a role to a user
 */
export interface AssignRoleParams {
  userId: number
  roleId: number
  assignedBy?: number
  expiresAt?: number
  notes?: string
}

/**
 * Minimal view of a user needed for authorization decisions
 */
export interface Actor {
  id: number
  is_active: boolean
  is_super_admin: boolean
}

/**
 * Row shapes as stored; booleans are 0/1
 */
export interface PermissionRow {
  id: number
  name: string
  slug: string
  description: string
  category: string
  resource: string
  action: string
  is_active: number
  requires_ownership: number
  can_delegate: number
  created_at: number
  updated_at: number
}

export interface RolePermissionRow {
  role_id: number
  permission_id: number
  is_active: number
  granted_at: number
  granted_by_id: number | null
  notes: string
}

export interface UserRoleRow {
  user_id: number
  role_id: number
  assigned_at: number
  expires_at: number | null
  is_active: number
  notes: string
  assigned_by_id: number | null
}

export interface CountRow {
  total: number
  active: number | null
}
