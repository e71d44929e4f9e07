/**
 * Book resource definition: schemas, fields and row mapping.
 *
 * @packageDocumentation
 */

import {
  integer,
  maxLength,
  minLength,
  minValue,
  nonEmpty,
  nullable,
  number,
  object,
  optional,
  picklist,
  pipe,
  string,
  trim,
  type InferOutput,
} from "valibot"
import type { Book, BookStatus } from "../contracts/types.js"
import { BOOK_STATUSES } from "../contracts/types.js"
import type { TableMapping } from "../persistence/repository.js"
import {
  definedColumns,
  type ResourceDefinition,
} from "../resource/resource-service.js"

const title = pipe(
  string("title is required"),
  trim(),
  nonEmpty("title is required"),
  maxLength(255, "title cannot exceed 255 characters"),
)
const author = pipe(
  string("author is required"),
  trim(),
  nonEmpty("author is required"),
  maxLength(255, "author cannot exceed 255 characters"),
)
const isbn = pipe(
  string("isbn is required"),
  trim(),
  nonEmpty("isbn is required"),
  minLength(10, "invalid ISBN format"),
  maxLength(17, "invalid ISBN format"),
)
const description = pipe(string("description must be a string"), trim())
const price = pipe(
  number("price must be a number"),
  minValue(0, "price cannot be negative"),
)
const status = picklist(
  BOOK_STATUSES,
  `status must be one of ${BOOK_STATUSES.join(", ")}`,
)
const publishedAt = nullable(
  pipe(
    number("publishedAt must be a timestamp"),
    integer("publishedAt must be a timestamp"),
  ),
)

export const CreateBookSchema = object({
  title,
  author,
  isbn,
  description: optional(description, ""),
  price: optional(price, 0),
  status: optional(status, "AVAILABLE"),
  publishedAt: optional(publishedAt, null),
})

export const UpdateBookSchema = object({
  title: optional(title),
  author: optional(author),
  isbn: optional(isbn),
  description: optional(description),
  price: optional(price),
  status: optional(status),
  publishedAt: optional(publishedAt),
})

export type CreateBookInput = InferOutput<typeof CreateBookSchema>
export type UpdateBookInput = InferOutput<typeof UpdateBookSchema>

export interface BookRow {
  id: number
  title: string
  author: string
  isbn: string
  description: string
  price: number
  status: string
  published_at: number | null
  created_at: number
  updated_at: number
}

export function isBookStatus(value: string): value is BookStatus {
  return BOOK_STATUSES.some((s) => s === value)
}

export const BOOK_TABLE: TableMapping<Book, BookRow> = {
  table: "books",
  primaryKey: "id",
  columns: [
    "title",
    "author",
    "isbn",
    "description",
    "price",
    "status",
    "published_at",
    "created_at",
    "updated_at",
  ],
  timestamps: true,
  fromRow: (row) => ({
    id: row.id,
    title: row.title,
    author: row.author,
    isbn: row.isbn,
    description: row.description,
    price: row.price,
    status: isBookStatus(row.status) ? row.status : "MAINTENANCE",
    published_at: row.published_at,
    created_at: row.created_at,
    updated_at: row.updated_at,
  }),
}

export const BOOK_RESOURCE: ResourceDefinition<
  Book,
  CreateBookInput,
  UpdateBookInput
> = {
  name: "books",
  title: "Book",
  version: "1.0.0",
  description: "Book catalog management",
  tableName: "books",
  sortableFields: [
    "id",
    "title",
    "author",
    "isbn",
    "price",
    "status",
    "createdAt",
    "updatedAt",
    "publishedAt",
  ],
  searchableFields: ["title", "author", "description", "isbn"],
  filters: {
    status: { column: "status", operator: "=", type: "string" },
    author: { column: "author", operator: "=", type: "string" },
    minPrice: { column: "price", operator: ">=", type: "number" },
    maxPrice: { column: "price", operator: "<=", type: "number" },
    isbn: { column: "isbn", operator: "=", type: "string" },
  },
  columnMapping: {
    id: "id",
    title: "title",
    author: "author",
    isbn: "isbn",
    description: "description",
    price: "price",
    status: "status",
    publishedAt: "published_at",
    createdAt: "created_at",
    updatedAt: "updated_at",
  },
  validationRules: {
    title: "required|string|max:255",
    author: "required|string|max:255",
    isbn: "required|string|min:10|max:17|unique",
    description: "string",
    price: "numeric|min:0",
    status: `in:${BOOK_STATUSES.join(",")}`,
    publishedAt: "integer|nullable",
  },
  createSchema: CreateBookSchema,
  updateSchema: UpdateBookSchema,
  toCreateColumns: (input) => ({
    title: input.title,
    author: input.author,
    isbn: input.isbn,
    description: input.description,
    price: input.price,
    status: input.status,
    published_at: input.publishedAt,
  }),
  toUpdateColumns: (input) =>
    definedColumns({
      title: input.title,
      author: input.author,
      isbn: input.isbn,
      description: input.description,
      price: input.price,
      status: input.status,
      published_at: input.publishedAt,
    }),
  conflictMessage: (input) =>
    input.isbn
      ? `a book with ISBN ${input.isbn} already exists`
      : "a book with this ISBN already exists",
}
