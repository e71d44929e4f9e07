/**
 * Capability contracts for resource services.
 *
 * A resource service is complete when it satisfies every group below.
 * Services declare `implements CompleteCrudService<T>` for the compile-time
 * check; {@link COMPLETE_CRUD_SERVICE} lists the same surface for the
 * registry's structural check at registration time.
 *
 * @packageDocumentation
 */

import type { ContractDefinition } from "./registry.js"
import type {
  BulkResult,
  ListRequestInput,
  PaginatedResult,
  SortSpec,
} from "./types.js"

export type RecordInput = Record<string, unknown>

export interface ModelDescriptor {
  name: string
  fields: string[]
}

export interface CrudServiceContract<T> {
  getList(request: ListRequestInput): Promise<PaginatedResult<T>>
  getListAdvanced(
    request: ListRequestInput,
    filters: Record<string, unknown>,
  ): Promise<PaginatedResult<T>>
  getById(id: number): Promise<T>
  create(data: RecordInput): Promise<T>
  update(id: number, data: RecordInput): Promise<T>
  delete(id: number): Promise<void>
}

export interface PaginationServiceContract<T> {
  getPaginatedList(request: ListRequestInput): Promise<PaginatedResult<T>>
  validatePaginationParams(page: number, pageSize: number): void
  getMaxPageSize(): number
  getDefaultPageSize(): number
}

export interface SortableServiceContract {
  getSortableFields(): string[]
  validateSortField(field: string): boolean
  validateSortDirection(direction: string): boolean
  getDefaultSort(): SortSpec
  /** Resolve a client-facing field name to its column, if sortable */
  mapSortField(field: string): string | undefined
}

export interface FilterableServiceContract {
  getFilterableFields(): string[]
  validateFilterField(field: string): boolean
  validateFilterValue(field: string, value: unknown): boolean
  getSearchableFields(): string[]
  /** Keep only known fields with acceptable values */
  buildFilterQuery(filters: Record<string, unknown>): Record<string, unknown>
}

export interface SearchableServiceContract<T> {
  search(query: string, request: ListRequestInput): Promise<PaginatedResult<T>>
  getSearchableFields(): string[]
  validateSearchQuery(query: string): void
}

export interface BulkOperationsContract<T> {
  bulkCreate(rows: RecordInput[]): Promise<T[]>
  bulkUpdate(ids: number[], data: RecordInput): Promise<BulkResult>
  bulkDelete(ids: number[]): Promise<BulkResult>
  validateBulkOperation(ids: number[]): void
}

export interface CrudServiceConfiguration {
  getTableName(): string
  getPrimaryKey(): string
  getModel(): ModelDescriptor
  getValidationRules(): Record<string, string>
  getColumnMapping(): Record<string, string>
}

export interface CompleteCrudService<T = unknown>
  extends CrudServiceContract<T>,
    PaginationServiceContract<T>,
    SortableServiceContract,
    FilterableServiceContract,
    SearchableServiceContract<T>,
    BulkOperationsContract<T>,
    CrudServiceConfiguration {}

export const COMPLETE_CRUD_SERVICE: ContractDefinition<CompleteCrudService> = {
  name: "CompleteCrudService",
  kind: "service",
  operations: [
    "getList",
    "getListAdvanced",
    "getById",
    "create",
    "update",
    "delete",
    "getPaginatedList",
    "validatePaginationParams",
    "getMaxPageSize",
    "getDefaultPageSize",
    "getSortableFields",
    "validateSortField",
    "validateSortDirection",
    "getDefaultSort",
    "mapSortField",
    "getFilterableFields",
    "validateFilterField",
    "validateFilterValue",
    "getSearchableFields",
    "buildFilterQuery",
    "search",
    "validateSearchQuery",
    "bulkCreate",
    "bulkUpdate",
    "bulkDelete",
    "validateBulkOperation",
    "getTableName",
    "getPrimaryKey",
    "getModel",
    "getValidationRules",
    "getColumnMapping",
  ],
}
