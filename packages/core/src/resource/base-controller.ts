/**
 * Base Resource Controller
 *
 * Request parsing, the JSON response envelope, error mapping and
 * authorization shared by every resource controller. Subclasses supply the
 * five actions.
 *
 * @packageDocumentation
 */

import type {
  ResourceContext,
  ResourceControllerContract,
} from "../contracts/controller.js"
import {
  AuthorizationError,
  ContractError,
  InvalidArgumentError,
  PartialFailureError,
  ValidationError,
} from "../contracts/errors.js"
import { applyListDefaults, normalizeDirection } from "../contracts/list-request.js"
import type { RecordInput } from "../contracts/service.js"
import type {
  ApiResponse,
  ControllerMetadata,
  ListRequest,
  PaginatedResponse,
  PaginatedResult,
  PaginationConfig,
} from "../contracts/types.js"
import { DEFAULT_RESOURCE_CONFIG } from "../contracts/types.js"

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500

const ERROR_STATUSES: readonly ErrorStatus[] = [400, 401, 403, 404, 409, 422, 500]

export function toErrorStatus(status: number): ErrorStatus {
  return ERROR_STATUSES.find((s) => s === status) ?? 500
}

/**
 * Answers "may this user do that?" for permission slugs
 */
export interface Authorizer {
  checkPermission(userId: number, permission: string): Promise<boolean>
}

/**
 * Action name to required permission slug
 */
export interface ActionPermissions {
  index: string
  show: string
  store: string
  update: string
  delete: string
  [action: string]: string
}

export interface BaseControllerOptions {
  /** Route segment and metadata name, e.g. "books" */
  resourceType: string
  /** Singular display name used in messages, e.g. "Book" */
  title: string
  permissions: ActionPermissions
  validationRules?: Record<string, string>
  pagination?: Partial<PaginationConfig>
  /** Without one, every permission check passes */
  authorizer?: Authorizer
}

export const DEFAULT_PAGINATION_CONFIG: PaginationConfig = {
  default_page_size: DEFAULT_RESOURCE_CONFIG.defaultPageSize,
  max_page_size: DEFAULT_RESOURCE_CONFIG.maxPageSize,
  allowed_sizes: DEFAULT_RESOURCE_CONFIG.allowedPageSizes,
}

const STANDARD_ACTIONS = ["index", "show", "store", "update", "delete"]

const FILTER_PARAM = /^filters\[(.+)\]$/

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * BaseResourceController
 *
 * TESTING CHECKLIST:
 * - page <= 0 is rejected, a non-numeric page becomes 1
 * - any pageSize outside allowed_sizes becomes the default
 * - validateId distinguishes missing, non-integer and non-positive ids
 * - handleError maps each ContractError to its status
 * - noContentResponse has an empty body
 */
export abstract class BaseResourceController implements ResourceControllerContract {
  protected resourceType: string
  protected title: string
  protected permissions: ActionPermissions
  protected validationRules: Record<string, string>
  protected pagination: PaginationConfig
  protected authorizer: Authorizer | undefined

  constructor(options: BaseControllerOptions) {
    this.resourceType = options.resourceType
    this.title = options.title
    this.permissions = options.permissions
    this.validationRules = options.validationRules ?? {}
    this.pagination = {
      ...DEFAULT_PAGINATION_CONFIG,
      ...options.pagination,
    }
    this.authorizer = options.authorizer
  }

  abstract index(c: ResourceContext): Promise<Response>
  abstract show(c: ResourceContext): Promise<Response>
  abstract store(c: ResourceContext): Promise<Response>
  abstract update(c: ResourceContext): Promise<Response>
  abstract delete(c: ResourceContext): Promise<Response>

  // ============================================
  // PAGINATION
  // ============================================

  validatePaginationRequest(c: ResourceContext): ListRequest {
    let page = Number.parseInt(c.req.query("page") ?? "", 10)
    if (Number.isNaN(page)) {
      page = 1
    }
    if (page <= 0) {
      throw new InvalidArgumentError("page must be greater than 0", "page")
    }

    let pageSize = Number.parseInt(c.req.query("pageSize") ?? "", 10)
    if (
      Number.isNaN(pageSize) ||
      pageSize <= 0 ||
      pageSize > this.pagination.max_page_size ||
      !this.pagination.allowed_sizes.includes(pageSize)
    ) {
      pageSize = this.pagination.default_page_size
    }

    const filters: Record<string, unknown> = {}
    for (const [key, values] of Object.entries(c.req.queries())) {
      const match = FILTER_PARAM.exec(key)
      if (match?.[1] && values[0] !== undefined) {
        filters[match[1]] = values[0]
      }
    }

    const { request } = applyListDefaults({
      page,
      pageSize,
      sort: c.req.query("sort"),
      direction: normalizeDirection(c.req.query("direction")),
      search: (c.req.query("search") ?? "").trim(),
      filters,
    })
    // applyListDefaults caps at the global maximum; keep the configured size
    return { ...request, pageSize }
  }

  getPaginationDefaults(): ListRequest {
    return {
      page: 1,
      pageSize: this.pagination.default_page_size,
      sort: "id",
      direction: "DESC",
      search: "",
      filters: {},
    }
  }

  setPaginationConfig(
    defaultSize: number,
    maxSize: number,
    allowedSizes: number[],
  ): void {
    this.pagination = {
      default_page_size: defaultSize,
      max_page_size: maxSize,
      allowed_sizes: [...allowedSizes],
    }
  }

  buildPaginatedResponse<T>(
    c: ResourceContext,
    result: PaginatedResult<T>,
    request: ListRequest,
  ): Response {
    const body: PaginatedResponse<T> = {
      success: true,
      data: result.data,
      pagination: {
        current_page: result.current_page,
        last_page: result.last_page,
        per_page: result.per_page,
        total: result.total,
        from: result.from,
        to: result.to,
        has_next: result.has_next,
        has_prev: result.has_prev,
      },
      filters: {
        search: request.search,
        sort: request.sort,
        direction: request.direction,
        ...request.filters,
      },
    }
    return c.json(body, 200)
  }

  // ============================================
  // VALIDATION
  // ============================================

  async validateCreateRequest(c: ResourceContext): Promise<RecordInput> {
    return this.readJsonBody(c)
  }

  async validateUpdateRequest(c: ResourceContext): Promise<RecordInput> {
    return this.readJsonBody(c)
  }

  validateId(c: ResourceContext, param = "id"): number {
    const raw: string | undefined = c.req.param(param)
    if (raw === undefined || raw === "") {
      throw new InvalidArgumentError(`${param} parameter is required`, param)
    }
    if (!/^-?\d+$/.test(raw)) {
      throw new InvalidArgumentError(
        `invalid ${param}: must be a positive integer`,
        param,
      )
    }
    const id = Number.parseInt(raw, 10)
    if (id <= 0) {
      throw new InvalidArgumentError(
        `invalid ${param}: must be greater than 0`,
        param,
      )
    }
    if (!Number.isSafeInteger(id)) {
      throw new InvalidArgumentError(
        `invalid ${param}: must be a positive integer`,
        param,
      )
    }
    return id
  }

  getValidationRules(): Record<string, string> {
    return { ...this.validationRules }
  }

  private async readJsonBody(c: ResourceContext): Promise<RecordInput> {
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      throw new InvalidArgumentError("invalid JSON body")
    }
    if (!isRecord(body)) {
      throw new InvalidArgumentError("invalid JSON body")
    }
    return body
  }

  // ============================================
  // RESPONSES
  // ============================================

  successResponse(c: ResourceContext, data?: unknown, message?: string): Response {
    const body: ApiResponse = { success: true, data, message }
    return c.json(body, 200)
  }

  createdResponse(c: ResourceContext, data: unknown, message?: string): Response {
    const body: ApiResponse = { success: true, data, message }
    return c.json(body, 201)
  }

  noContentResponse(c: ResourceContext): Response {
    return c.body(null, 204)
  }

  badRequestResponse(
    c: ResourceContext,
    message: string,
    errors?: Record<string, string>,
  ): Response {
    return this.errorResponse(c, 400, message, errors)
  }

  notFoundResponse(c: ResourceContext, message: string): Response {
    return this.errorResponse(c, 404, message)
  }

  forbiddenResponse(c: ResourceContext, message: string): Response {
    return this.errorResponse(c, 403, message)
  }

  validationErrorResponse(
    c: ResourceContext,
    errors: Record<string, string>,
  ): Response {
    return this.errorResponse(c, 422, "Validation failed", errors)
  }

  internalErrorResponse(
    c: ResourceContext,
    message = "internal server error",
  ): Response {
    return this.errorResponse(c, 500, message)
  }

  resourceNotFoundResponse(c: ResourceContext, id: number): Response {
    return this.notFoundResponse(c, `${this.title} with ID ${id} not found`)
  }

  resourceCreatedResponse(c: ResourceContext, data: unknown): Response {
    return this.createdResponse(c, data, `${this.title} created successfully`)
  }

  resourceUpdatedResponse(c: ResourceContext, data: unknown): Response {
    return this.successResponse(c, data, `${this.title} updated successfully`)
  }

  resourceDeletedResponse(c: ResourceContext, id: number): Response {
    return this.successResponse(
      c,
      undefined,
      `${this.title} with ID ${id} deleted successfully`,
    )
  }

  protected errorResponse(
    c: ResourceContext,
    status: ErrorStatus,
    message: string,
    errors?: Record<string, string>,
    meta?: Record<string, unknown>,
  ): Response {
    const body: ApiResponse = { success: false, message, errors, meta }
    return c.json(body, status)
  }

  /**
   * Map any thrown value to the response envelope
   */
  handleError(c: ResourceContext, error: unknown): Response {
    if (error instanceof ValidationError) {
      return this.validationErrorResponse(c, error.errors)
    }
    if (error instanceof InvalidArgumentError) {
      return this.badRequestResponse(
        c,
        error.message,
        error.field ? { [error.field]: error.message } : undefined,
      )
    }
    if (error instanceof PartialFailureError) {
      return this.errorResponse(
        c,
        toErrorStatus(error.status),
        error.message,
        undefined,
        { succeeded: error.succeeded, attempted: error.attempted },
      )
    }
    if (error instanceof ContractError) {
      return this.errorResponse(c, toErrorStatus(error.status), error.message)
    }
    console.error(`${this.resourceType} controller error:`, error)
    return this.internalErrorResponse(c)
  }

  // ============================================
  // AUTHORIZATION
  // ============================================

  getCurrentUser(c: ResourceContext): number | undefined {
    return c.get("userId")
  }

  requireAuthentication(c: ResourceContext): number {
    const userId = this.getCurrentUser(c)
    if (userId === undefined) {
      throw new AuthorizationError("authentication required", 401)
    }
    return userId
  }

  async checkPermission(c: ResourceContext, permission: string): Promise<boolean> {
    if (!this.authorizer) return true
    const userId = this.getCurrentUser(c)
    if (userId === undefined) return false
    return this.authorizer.checkPermission(userId, permission)
  }

  /**
   * What the current user may do with this resource, keyed by capability
   */
  async buildPermissionsMap(c: ResourceContext): Promise<Record<string, boolean>> {
    const capabilities: Record<string, string> = {
      list: this.permissions.index,
      read: this.permissions.show,
      create: this.permissions.store,
      update: this.permissions.update,
      delete: this.permissions.delete,
    }
    for (const [action, slug] of Object.entries(this.permissions)) {
      if (!STANDARD_ACTIONS.includes(action)) capabilities[action] = slug
    }

    const map: Record<string, boolean> = {}
    for (const [capability, slug] of Object.entries(capabilities)) {
      map[capability] = await this.checkPermission(c, slug)
    }
    return map
  }

  /**
   * Throw unless the current user holds the permission bound to `action`
   */
  protected async authorize(c: ResourceContext, action: string): Promise<void> {
    const slug = this.permissions[action]
    if (slug === undefined) {
      throw new Error(`no permission configured for action ${action}`)
    }
    if (this.authorizer) {
      this.requireAuthentication(c)
    }
    if (!(await this.checkPermission(c, slug))) {
      throw new AuthorizationError(`permission denied: ${slug}`, 403)
    }
  }

  // ============================================
  // METADATA
  // ============================================

  generateMetadata(): ControllerMetadata {
    return {
      resource_type: this.resourceType,
      supported_actions: Object.keys(this.permissions),
      required_permissions: { ...this.permissions },
      validation_rules: this.getValidationRules(),
      pagination_config: {
        ...this.pagination,
        allowed_sizes: [...this.pagination.allowed_sizes],
      },
      response_formats: ["json"],
    }
  }
}
