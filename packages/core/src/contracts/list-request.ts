/**
 * ListRequest defaulting and PaginatedResult construction.
 *
 * @packageDocumentation
 */

import type {
  ListRequest,
  ListRequestInput,
  PaginatedResult,
  SortDirection,
} from "./types.js"
import { DEFAULT_RESOURCE_CONFIG } from "./types.js"

export function isSortDirection(value: string): value is SortDirection {
  return value === "ASC" || value === "DESC"
}

/**
 * Upper-case the direction, falling back to DESC for anything unrecognized
 */
export function normalizeDirection(direction: string | undefined): SortDirection {
  const upper = (direction ?? "").trim().toUpperCase()
  return isSortDirection(upper) ? upper : "DESC"
}

/**
 * Fill in missing or non-positive list parameters.
 *
 * Direction is only defaulted when empty; an unrecognized value is kept
 * verbatim in the returned `rawDirection` so validators can reject it.
 */
export function applyListDefaults(input: ListRequestInput): {
  request: ListRequest
  rawDirection: string
} {
  let page = input.page ?? 0
  if (!Number.isFinite(page) || page <= 0) page = 1

  let pageSize = input.pageSize ?? 0
  if (!Number.isFinite(pageSize) || pageSize <= 0) {
    pageSize = DEFAULT_RESOURCE_CONFIG.defaultPageSize
  }
  if (pageSize > DEFAULT_RESOURCE_CONFIG.maxPageSize) {
    pageSize = DEFAULT_RESOURCE_CONFIG.maxPageSize
  }

  const rawDirection = (input.direction ?? "").trim() || "DESC"

  return {
    request: {
      page: Math.floor(page),
      pageSize: Math.floor(pageSize),
      sort: input.sort?.trim() || "id",
      direction: normalizeDirection(rawDirection),
      search: input.search ?? "",
      filters: { ...(input.filters ?? {}) },
    },
    rawDirection,
  }
}

export function pageOffset(request: Pick<ListRequest, "page" | "pageSize">): number {
  return (request.page - 1) * request.pageSize
}

/**
 * Derive every pagination field from the page of rows and the total count
 */
export function buildPaginatedResult<T>(
  data: T[],
  total: number,
  request: Pick<ListRequest, "page" | "pageSize">,
): PaginatedResult<T> {
  const offset = pageOffset(request)
  const lastPage = Math.ceil(total / request.pageSize)
  return {
    data,
    total,
    per_page: request.pageSize,
    current_page: request.page,
    last_page: lastPage,
    from: offset + 1,
    to: offset + data.length,
    has_next: request.page < lastPage,
    has_prev: request.page > 1,
  }
}
