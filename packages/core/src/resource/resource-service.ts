/**
 * Resource Service
 *
 * Complete CRUD service for one table. Behaviour common to every resource
 * comes from the composed {@link BaseResourceService}; everything specific to
 * a resource (fields, filters, validation schemas, column mapping) comes from
 * its {@link ResourceDefinition}.
 *
 * @packageDocumentation
 */

import { getDotPath, safeParse, type GenericSchema } from "valibot"
import {
  ConflictError,
  InvalidArgumentError,
  NotFoundError,
  PartialFailureError,
  ValidationError,
} from "../contracts/errors.js"
import { pageOffset } from "../contracts/list-request.js"
import type {
  CompleteCrudService,
  ModelDescriptor,
  RecordInput,
} from "../contracts/service.js"
import type {
  BulkResult,
  ListRequestInput,
  PaginatedResult,
  ResourceConfig,
  ServiceMetadata,
  SortSpec,
} from "../contracts/types.js"
import {
  isForeignKeyViolation,
  isUniqueViolation,
  type SqlValue,
} from "../persistence/database.js"
import type {
  Condition,
  ConditionOperator,
  Repository,
} from "../persistence/repository.js"
import { BaseResourceService } from "./base-service.js"

export interface FilterCondition {
  column: string
  operator: ConditionOperator
  /** How query-string values are coerced before binding */
  type: "string" | "number" | "boolean"
}

export interface ResourceDefinition<T, Create, Update> {
  /** Registry name and permission resource, e.g. "books" */
  name: string
  /** Singular display name used in messages, e.g. "Book" */
  title: string
  version: string
  description: string
  tableName: string
  primaryKey?: string
  sortableFields: string[]
  searchableFields: string[]
  filters: Record<string, FilterCondition>
  /** Client-facing field name to column */
  columnMapping: Record<string, string>
  validationRules: Record<string, string>
  createSchema: GenericSchema<unknown, Create>
  updateSchema: GenericSchema<unknown, Update>
  toCreateColumns(input: Create): Record<string, SqlValue>
  toUpdateColumns(input: Update): Record<string, SqlValue>
  /** Message for a unique-constraint failure */
  conflictMessage?(input: Create | Update): string
}

/**
 * Parse untrusted input, collecting every field error
 */
export function parseInput<Output>(
  schema: GenericSchema<unknown, Output>,
  input: unknown,
): Output {
  const result = safeParse(schema, input)
  if (result.success) {
    return result.output
  }

  const errors: Record<string, string> = {}
  for (const issue of result.issues) {
    const field = getDotPath(issue) ?? "_root"
    if (field in errors) continue
    // A missing key is reported against the enclosing object
    const missingKey =
      issue.type === "object" && issue.path !== undefined && issue.input === undefined
    errors[field] = missingKey ? `${field} is required` : issue.message
  }
  throw new ValidationError(errors)
}

/**
 * Drop columns the input left undefined, for partial updates
 */
export function definedColumns(
  columns: Record<string, SqlValue | undefined>,
): Record<string, SqlValue> {
  const defined: Record<string, SqlValue> = {}
  for (const [column, value] of Object.entries(columns)) {
    if (value !== undefined) defined[column] = value
  }
  return defined
}

function coerceFilterValue(
  field: string,
  value: unknown,
  type: FilterCondition["type"],
): SqlValue {
  if (type === "boolean") {
    if (typeof value === "boolean") return value ? 1 : 0
    if (value === "true" || value === "1" || value === 1) return 1
    return 0
  }
  if (type === "number") {
    const number = typeof value === "number" ? value : Number(value)
    if (!Number.isFinite(number)) {
      throw new InvalidArgumentError(
        `invalid value for filter ${field}: must be a number`,
        field,
      )
    }
    return number
  }
  return typeof value === "string" ? value.trim() : String(value)
}

/**
 * ResourceService - generic CompleteCrudService over a Repository
 *
 * TESTING CHECKLIST:
 * - getListAdvanced drops unknown filters and invalid values
 * - a number filter that does not parse is rejected, not sent as NaN
 * - unknown sort fields fall back to the default sort
 * - create/update surface every field error at once
 * - unique violations become ConflictError
 * - bulk operations stop at the first failure and report N of M
 */
export class ResourceService<T, Create = RecordInput, Update = RecordInput>
  implements CompleteCrudService<T>
{
  readonly base: BaseResourceService
  protected repository: Repository<T>
  protected definition: ResourceDefinition<T, Create, Update>

  constructor(
    repository: Repository<T>,
    definition: ResourceDefinition<T, Create, Update>,
    config?: Partial<ResourceConfig>,
  ) {
    this.repository = repository
    this.definition = definition
    this.base = new BaseResourceService({
      ...config,
      tableName: definition.tableName,
      primaryKey: definition.primaryKey,
    })
  }

  // ============================================
  // CRUD
  // ============================================

  async getList(request: ListRequestInput): Promise<PaginatedResult<T>> {
    return this.getListAdvanced(request, request.filters ?? {})
  }

  async getListAdvanced(
    input: ListRequestInput,
    filters: Record<string, unknown>,
  ): Promise<PaginatedResult<T>> {
    const request = this.base.sanitizeListRequest(
      this.base.validateListRequest(input),
    )

    const where = this.toConditions(this.buildFilterQuery(filters))
    const search =
      request.search !== ""
        ? {
            columns: this.definition.searchableFields.map((f) => this.columnFor(f)),
            term: request.search,
          }
        : undefined

    const defaultSort = this.getDefaultSort()
    const column =
      this.mapSortField(request.sort) ?? this.columnFor(defaultSort.field)

    const total = await this.repository.count({ where, search })
    const rows = await this.repository.findMany({
      where,
      search,
      orderBy: { column, direction: request.direction },
      limit: request.pageSize,
      offset: pageOffset(request),
    })

    return this.base.buildPaginatedResult(rows, total, request)
  }

  async getPaginatedList(
    request: ListRequestInput,
  ): Promise<PaginatedResult<T>> {
    return this.getList(request)
  }

  async getById(id: number): Promise<T> {
    const record = await this.repository.find(id)
    if (!record) {
      throw this.notFound(id)
    }
    return record
  }

  async create(data: RecordInput): Promise<T> {
    const input = parseInput(this.definition.createSchema, data)
    try {
      return await this.repository.create(this.definition.toCreateColumns(input))
    } catch (error) {
      throw this.translateWriteError(error, input)
    }
  }

  async update(id: number, data: RecordInput): Promise<T> {
    const existing = await this.getById(id)
    const input = parseInput(this.definition.updateSchema, data)
    const columns = this.definition.toUpdateColumns(input)
    if (Object.keys(columns).length === 0) {
      return existing
    }

    try {
      const updated = await this.repository.update(id, columns)
      if (!updated) throw this.notFound(id)
      return updated
    } catch (error) {
      throw this.translateWriteError(error, input)
    }
  }

  async delete(id: number): Promise<void> {
    const deleted = await this.repository.delete(id)
    if (!deleted) {
      throw this.notFound(id)
    }
  }

  // ============================================
  // PAGINATION
  // ============================================

  validatePaginationParams(page: number, pageSize: number): void {
    this.base.validatePaginationParams(page, pageSize)
  }

  getMaxPageSize(): number {
    return this.base.getMaxPageSize()
  }

  getDefaultPageSize(): number {
    return this.base.getDefaultPageSize()
  }

  // ============================================
  // SORTING
  // ============================================

  getSortableFields(): string[] {
    return [...this.definition.sortableFields]
  }

  validateSortField(field: string): boolean {
    return this.definition.sortableFields.includes(field)
  }

  validateSortDirection(direction: string): boolean {
    return this.base.validateSortDirection(direction)
  }

  getDefaultSort(): SortSpec {
    return this.base.getDefaultSort()
  }

  mapSortField(field: string): string | undefined {
    if (!this.validateSortField(field)) return undefined
    return this.columnFor(field)
  }

  // ============================================
  // FILTERING / SEARCH
  // ============================================

  getFilterableFields(): string[] {
    return Object.keys(this.definition.filters)
  }

  validateFilterField(field: string): boolean {
    return Object.hasOwn(this.definition.filters, field)
  }

  validateFilterValue(field: string, value: unknown): boolean {
    return this.base.validateFilterValue(field, value)
  }

  getSearchableFields(): string[] {
    return [...this.definition.searchableFields]
  }

  buildFilterQuery(filters: Record<string, unknown>): Record<string, unknown> {
    const validated: Record<string, unknown> = {}
    for (const [field, value] of Object.entries(filters)) {
      if (!this.validateFilterField(field)) continue
      if (!this.validateFilterValue(field, value)) continue
      validated[field] = value
    }
    return validated
  }

  async search(
    query: string,
    request: ListRequestInput,
  ): Promise<PaginatedResult<T>> {
    this.validateSearchQuery(query)
    return this.getListAdvanced(
      { ...request, search: query.trim() },
      request.filters ?? {},
    )
  }

  validateSearchQuery(query: string): void {
    this.base.validateSearchQuery(query)
  }

  // ============================================
  // BULK
  // ============================================

  /**
   * Every payload is validated before the first insert. Inserts then run one
   * at a time without a transaction.
   */
  async bulkCreate(rows: RecordInput[]): Promise<T[]> {
    this.base.validateBulkSize(rows.length)
    const inputs = rows.map((row) => parseInput(this.definition.createSchema, row))

    const created: T[] = []
    for (const input of inputs) {
      try {
        created.push(
          await this.repository.create(this.definition.toCreateColumns(input)),
        )
      } catch (error) {
        throw new PartialFailureError(
          created.length,
          inputs.length,
          this.translateWriteError(error, input),
        )
      }
    }
    return created
  }

  async bulkUpdate(ids: number[], data: RecordInput): Promise<BulkResult> {
    this.validateBulkOperation(ids)
    parseInput(this.definition.updateSchema, data)
    return this.runSequentially(ids, (id) => this.update(id, data))
  }

  async bulkDelete(ids: number[]): Promise<BulkResult> {
    this.validateBulkOperation(ids)
    return this.runSequentially(ids, (id) => this.delete(id))
  }

  validateBulkOperation(ids: number[]): void {
    this.base.validateBulkOperation(ids)
  }

  protected async runSequentially(
    ids: number[],
    operation: (id: number) => Promise<unknown>,
  ): Promise<BulkResult> {
    let succeeded = 0
    for (const id of ids) {
      try {
        await operation(id)
      } catch (error) {
        throw new PartialFailureError(
          succeeded,
          ids.length,
          error instanceof Error ? error : new Error(String(error)),
        )
      }
      succeeded++
    }
    return { succeeded, attempted: ids.length }
  }

  // ============================================
  // CONFIGURATION
  // ============================================

  getTableName(): string {
    return this.base.getTableName()
  }

  getPrimaryKey(): string {
    return this.base.getPrimaryKey()
  }

  getModel(): ModelDescriptor {
    return {
      name: this.definition.title,
      fields: Object.keys(this.definition.columnMapping),
    }
  }

  getValidationRules(): Record<string, string> {
    return { ...this.definition.validationRules }
  }

  getColumnMapping(): Record<string, string> {
    return { ...this.definition.columnMapping }
  }

  getMetadata(): ServiceMetadata {
    return this.base.generateMetadata(
      this.definition.name,
      this.definition.version,
      this.definition.description,
      {
        sortableFields: this.getSortableFields(),
        filterableFields: this.getFilterableFields(),
        searchableFields: this.getSearchableFields(),
      },
    )
  }

  get resourceName(): string {
    return this.definition.name
  }

  get resourceTitle(): string {
    return this.definition.title
  }

  // ============================================
  // HELPERS
  // ============================================

  protected columnFor(field: string): string {
    return this.definition.columnMapping[field] ?? field
  }

  protected notFound(id: number): NotFoundError {
    return new NotFoundError(`${this.definition.title} with ID ${id} not found`)
  }

  private toConditions(filters: Record<string, unknown>): Condition[] {
    const conditions: Condition[] = []
    for (const [field, value] of Object.entries(filters)) {
      const filter = this.definition.filters[field]
      if (!filter) continue
      conditions.push({
        column: filter.column,
        operator: filter.operator,
        value: coerceFilterValue(field, value, filter.type),
      })
    }
    return conditions
  }

  private translateWriteError(error: unknown, input: Create | Update): Error {
    if (isUniqueViolation(error)) {
      return new ConflictError(
        this.definition.conflictMessage?.(input) ??
          `${this.definition.title} already exists`,
      )
    }
    if (isForeignKeyViolation(error)) {
      return new InvalidArgumentError("referenced record does not exist")
    }
    return error instanceof Error ? error : new Error(String(error))
  }
}
