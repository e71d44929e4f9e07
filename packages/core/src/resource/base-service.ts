/**
 * Base Resource Service
 *
 * Default pagination, sorting, filtering and bulk validation shared by every
 * resource. Concrete services hold an instance and delegate to it.
 *
 * @packageDocumentation
 */

import {
  ConflictError,
  InvalidArgumentError,
} from "../contracts/errors.js"
import {
  applyListDefaults,
  buildPaginatedResult,
  isSortDirection,
  normalizeDirection,
} from "../contracts/list-request.js"
import type {
  ListRequest,
  ListRequestInput,
  PaginatedResult,
  ResourceConfig,
  ServiceMetadata,
  SortSpec,
} from "../contracts/types.js"
import {
  DEFAULT_RESOURCE_CONFIG,
  MAX_BULK_ITEMS,
  SUPPORTED_OPERATIONS,
} from "../contracts/types.js"

export interface BaseResourceOptions extends Partial<ResourceConfig> {
  tableName: string
  primaryKey?: string
}

export interface MetadataFields {
  sortableFields: string[]
  filterableFields: string[]
  searchableFields: string[]
}

export const MIN_SEARCH_LENGTH = 2
export const MAX_SEARCH_LENGTH = 100

/**
 * BaseResourceService
 *
 * TESTING CHECKLIST:
 * - validatePaginationParams rejects page <= 0, pageSize <= 0, pageSize > max
 * - sanitizeListRequest clamps page and pageSize, normalizes direction
 * - validateBulkOperation reports the specific zero or duplicate id
 * - setMaxPageSize / setDefaultPageSize ignore out-of-range values
 */
export class BaseResourceService {
  private tableName: string
  private primaryKey: string
  private config: ResourceConfig

  constructor(options: BaseResourceOptions) {
    const { tableName, primaryKey, ...config } = options
    this.tableName = tableName
    this.primaryKey = primaryKey ?? "id"
    this.config = {
      ...DEFAULT_RESOURCE_CONFIG,
      ...config,
    }
  }

  // ============================================
  // PAGINATION
  // ============================================

  validatePaginationParams(page: number, pageSize: number): void {
    if (page <= 0) {
      throw new InvalidArgumentError("page must be greater than 0", "page")
    }
    if (pageSize <= 0) {
      throw new InvalidArgumentError(
        "pageSize must be greater than 0",
        "pageSize",
      )
    }
    if (pageSize > this.config.maxPageSize) {
      throw new InvalidArgumentError(
        `pageSize cannot exceed ${this.config.maxPageSize}`,
        "pageSize",
      )
    }
  }

  /**
   * Apply defaults, then reject what defaulting cannot repair
   */
  validateListRequest(input: ListRequestInput): ListRequest {
    const { request, rawDirection } = applyListDefaults(input)

    try {
      this.validatePaginationParams(request.page, request.pageSize)
    } catch (error) {
      if (error instanceof InvalidArgumentError) {
        throw new InvalidArgumentError(
          `pagination validation failed: ${error.message}`,
          error.field,
        )
      }
      throw error
    }

    if (!this.validateSortDirection(rawDirection)) {
      throw new InvalidArgumentError(
        `invalid sort direction: ${rawDirection}`,
        "direction",
      )
    }

    return request
  }

  /**
   * Coerce every list parameter into range. Never throws.
   */
  sanitizeListRequest(input: ListRequestInput): ListRequest {
    let page = input.page ?? 1
    if (!Number.isFinite(page) || page <= 0) page = 1

    let pageSize = input.pageSize ?? this.config.defaultPageSize
    if (!Number.isFinite(pageSize) || pageSize <= 0) {
      pageSize = this.config.defaultPageSize
    } else if (pageSize > this.config.maxPageSize) {
      pageSize = this.config.maxPageSize
    } else if (!this.isRecognizedPageSize(pageSize)) {
      pageSize = this.config.defaultPageSize
    }

    return {
      page: Math.floor(page),
      pageSize,
      sort: input.sort?.trim() || this.primaryKey,
      direction: normalizeDirection(input.direction),
      search: (input.search ?? "").trim(),
      filters: { ...(input.filters ?? {}) },
    }
  }

  isRecognizedPageSize(pageSize: number): boolean {
    return (
      pageSize === this.config.maxPageSize ||
      this.config.allowedPageSizes.includes(pageSize)
    )
  }

  getMaxPageSize(): number {
    return this.config.maxPageSize
  }

  getDefaultPageSize(): number {
    return this.config.defaultPageSize
  }

  getAllowedPageSizes(): number[] {
    return [...this.config.allowedPageSizes]
  }

  setMaxPageSize(size: number): void {
    if (size > 0) {
      this.config.maxPageSize = size
    }
  }

  setDefaultPageSize(size: number): void {
    if (size > 0 && size <= this.config.maxPageSize) {
      this.config.defaultPageSize = size
    }
  }

  buildPaginatedResult<T>(
    data: T[],
    total: number,
    request: ListRequest,
  ): PaginatedResult<T> {
    return buildPaginatedResult(data, total, request)
  }

  // ============================================
  // SORTING / FILTERING / SEARCH
  // ============================================

  validateSortDirection(direction: string): boolean {
    return isSortDirection(direction.toUpperCase())
  }

  getDefaultSort(): SortSpec {
    return { field: this.primaryKey, direction: "DESC" }
  }

  validateFilterValue(_field: string, value: unknown): boolean {
    if (value === null || value === undefined) return false
    switch (typeof value) {
      case "string":
        return value.trim() !== ""
      case "number":
        return !Number.isNaN(value)
      case "bigint":
      case "boolean":
        return true
      default:
        return false
    }
  }

  validateSearchQuery(query: string): void {
    const trimmed = query.trim()
    if (trimmed.length < MIN_SEARCH_LENGTH) {
      throw new InvalidArgumentError(
        `search query must be at least ${MIN_SEARCH_LENGTH} characters`,
        "search",
      )
    }
    if (trimmed.length > MAX_SEARCH_LENGTH) {
      throw new InvalidArgumentError(
        `search query cannot exceed ${MAX_SEARCH_LENGTH} characters`,
        "search",
      )
    }
  }

  // ============================================
  // BULK
  // ============================================

  validateBulkOperation(ids: number[]): void {
    this.validateBulkSize(ids.length)

    const seen = new Set<number>()
    for (const id of ids) {
      if (!Number.isInteger(id) || id <= 0) {
        throw new InvalidArgumentError(`invalid ID (${id}) in bulk operation`, "ids")
      }
      if (seen.has(id)) {
        throw new ConflictError(`duplicate ID ${id} in bulk operation`)
      }
      seen.add(id)
    }
  }

  validateBulkSize(count: number): void {
    if (count === 0) {
      throw new InvalidArgumentError("no IDs provided for bulk operation", "ids")
    }
    if (count > MAX_BULK_ITEMS) {
      throw new InvalidArgumentError(
        `bulk operation cannot exceed ${MAX_BULK_ITEMS} items`,
        "ids",
      )
    }
  }

  // ============================================
  // CONFIGURATION
  // ============================================

  getTableName(): string {
    return this.tableName
  }

  getPrimaryKey(): string {
    return this.primaryKey
  }

  generateMetadata(
    name: string,
    version: string,
    description: string,
    fields: MetadataFields,
  ): ServiceMetadata {
    return {
      name,
      version,
      description,
      supported_operations: [...SUPPORTED_OPERATIONS],
      sortable_fields: fields.sortableFields,
      filterable_fields: fields.filterableFields,
      searchable_fields: fields.searchableFields,
      default_sort: this.getDefaultSort(),
      max_page_size: this.config.maxPageSize,
      default_page_size: this.config.defaultPageSize,
      table_name: this.tableName,
      primary_key: this.primaryKey,
    }
  }
}
