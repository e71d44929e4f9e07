/**
 * Shared contracts for the admin resource framework and RBAC engine.
 * All implementations MUST adhere to these interfaces.
 *
 * @packageDocumentation
 */

// ============================================
// LIST / PAGINATION CONTRACTS
// ============================================

export type SortDirection = "ASC" | "DESC"

/**
 * A normalized list query. Produced by {@link applyListDefaults} or one of
 * the base service's validate/sanitize helpers.
 */
export interface ListRequest {
  page: number
  pageSize: number
  sort: string
  direction: SortDirection
  search: string
  filters: Record<string, unknown>
}

/**
 * Raw list query as a caller supplies it. Nothing is trusted yet.
 */
export interface ListRequestInput {
  page?: number
  pageSize?: number
  sort?: string
  direction?: string
  search?: string
  filters?: Record<string, unknown>
}

export interface PaginatedResult<T> {
  data: T[]
  total: number
  per_page: number
  current_page: number
  last_page: number
  from: number
  to: number
  has_next: boolean
  has_prev: boolean
}

export interface SortSpec {
  field: string
  direction: SortDirection
}

export interface ResourceConfig {
  maxPageSize: number
  defaultPageSize: number
  allowedPageSizes: number[]
}

export const DEFAULT_RESOURCE_CONFIG: ResourceConfig = {
  maxPageSize: 100,
  defaultPageSize: 20,
  allowedPageSizes: [5, 10, 20, 30, 50, 100],
}

export const MAX_BULK_ITEMS = 1000

export const SUPPORTED_OPERATIONS = [
  "CREATE",
  "READ",
  "UPDATE",
  "DELETE",
  "LIST",
  "SEARCH",
  "BULK",
] as const

export type SupportedOperation = (typeof SUPPORTED_OPERATIONS)[number]

export interface ServiceMetadata {
  name: string
  version: string
  description: string
  supported_operations: SupportedOperation[]
  sortable_fields: string[]
  filterable_fields: string[]
  searchable_fields: string[]
  default_sort: SortSpec
  max_page_size: number
  default_page_size: number
  table_name: string
  primary_key: string
}

export interface PaginationConfig {
  default_page_size: number
  max_page_size: number
  allowed_sizes: number[]
}

export interface ControllerMetadata {
  resource_type: string
  supported_actions: string[]
  required_permissions: Record<string, string>
  validation_rules: Record<string, string>
  pagination_config: PaginationConfig
  response_formats: string[]
}

// ============================================
// RESPONSE ENVELOPE
// ============================================

export interface ApiResponse<T = unknown> {
  success: boolean
  data?: T
  message?: string
  errors?: Record<string, string>
  meta?: Record<string, unknown>
}

export interface PaginationMeta {
  current_page: number
  last_page: number
  per_page: number
  total: number
  from: number
  to: number
  has_next: boolean
  has_prev: boolean
}

export interface PaginatedResponse<T> {
  success: true
  data: T[]
  pagination: PaginationMeta
  filters: Record<string, unknown>
}

// ============================================
// RBAC CONTRACTS
// ============================================

export interface Role {
  id: number
  name: string
  slug: string
  description: string
  level: number
  parent_id: number | null
  is_active: boolean
  created_at: number
  updated_at: number
}

export interface Permission {
  id: number
  name: string
  slug: string
  description: string
  category: string
  resource: string
  action: string
  is_active: boolean
  requires_ownership: boolean
  can_delegate: boolean
  created_at: number
  updated_at: number
}

export interface RolePermission {
  role_id: number
  permission_id: number
  is_active: boolean
  granted_at: number
  granted_by_id: number | null
  notes: string
}

export interface UserRole {
  user_id: number
  role_id: number
  assigned_at: number
  expires_at: number | null
  is_active: boolean
  notes: string
  assigned_by_id: number | null
}

export interface RoleWithPermissions extends Role {
  permission_ids: number[]
  permission_count: number
}

export interface PermissionGroup {
  category: string
  permissions: Permission[]
}

export interface MatrixStats {
  total_roles: number
  total_permissions: number
  total_assignments: number
  active_roles: number
  active_permissions: number
}

export interface PermissionMatrix {
  roles: RoleWithPermissions[]
  permissions: PermissionGroup[]
  matrix: Record<number, number[]>
  stats: MatrixStats
}

export type BulkPermissionAction = "assign" | "revoke"

export interface BulkPermissionRequest {
  role_id: number
  permission_ids: number[]
  action: string
}

export interface BulkResult {
  succeeded: number
  attempted: number
}

export interface GateSyncResult {
  created: number
  updated: number
}

/**
 * Permission definition as it appears in a static catalog.
 */
export interface PermissionDefinition {
  name: string
  slug: string
  category: string
  resource: string
  action: string
  description: string
}

// ============================================
// RESOURCE ENTITIES
// ============================================

export const BOOK_STATUSES = ["AVAILABLE", "BORROWED", "MAINTENANCE"] as const

export type BookStatus = (typeof BOOK_STATUSES)[number]

export interface Book {
  id: number
  title: string
  author: string
  isbn: string
  description: string
  price: number
  status: BookStatus
  published_at: number | null
  created_at: number
  updated_at: number
}

export interface User {
  id: number
  name: string
  email: string
  is_active: boolean
  is_super_admin: boolean
  created_at: number
  updated_at: number
}
