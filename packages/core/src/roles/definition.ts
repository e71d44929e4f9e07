/**
 * Role resource definition.
 *
 * @packageDocumentation
 */

import {
  boolean,
  integer,
  maxLength,
  minValue,
  nonEmpty,
  nullable,
  number,
  object,
  optional,
  pipe,
  string,
  trim,
  type InferOutput,
} from "valibot"
import type { Role } from "../contracts/types.js"
import { toSqlBoolean } from "../persistence/database.js"
import type { TableMapping } from "../persistence/repository.js"
import {
  definedColumns,
  type ResourceDefinition,
} from "../resource/resource-service.js"

/**
 * "Library Staff" -> "library-staff"
 */
export function roleSlug(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "-")
}

const name = pipe(
  string("name is required"),
  trim(),
  nonEmpty("name is required"),
  maxLength(100, "name cannot exceed 100 characters"),
)
const level = pipe(
  number("level must be a number"),
  integer("level must be an integer"),
  minValue(1, "level must be at least 1"),
)
const parentId = nullable(
  pipe(
    number("parentId must be a role id"),
    integer("parentId must be a role id"),
    minValue(1, "parentId must be a role id"),
  ),
)

export const CreateRoleSchema = object({
  name,
  description: optional(pipe(string("description must be a string"), trim()), ""),
  level: optional(level, 1),
  parentId: optional(parentId, null),
  isActive: optional(boolean("isActive must be a boolean"), true),
})

export const UpdateRoleSchema = object({
  name: optional(name),
  description: optional(pipe(string("description must be a string"), trim())),
  level: optional(level),
  parentId: optional(parentId),
  isActive: optional(boolean("isActive must be a boolean")),
})

export type CreateRoleInput = InferOutput<typeof CreateRoleSchema>
export type UpdateRoleInput = InferOutput<typeof UpdateRoleSchema>

export interface RoleRow {
  id: number
  name: string
  slug: string
  description: string
  level: number
  parent_id: number | null
  is_active: number
  created_at: number
  updated_at: number
}

export function roleFromRow(row: RoleRow): Role {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    description: row.description,
    level: row.level,
    parent_id: row.parent_id,
    is_active: row.is_active === 1,
    created_at: row.created_at,
    updated_at: row.updated_at,
  }
}

export const ROLE_TABLE: TableMapping<Role, RoleRow> = {
  table: "roles",
  primaryKey: "id",
  columns: [
    "name",
    "slug",
    "description",
    "level",
    "parent_id",
    "is_active",
    "created_at",
    "updated_at",
  ],
  timestamps: true,
  fromRow: roleFromRow,
}

export const ROLE_RESOURCE: ResourceDefinition<
  Role,
  CreateRoleInput,
  UpdateRoleInput
> = {
  name: "roles",
  title: "Role",
  version: "1.0.0",
  description: "Role management",
  tableName: "roles",
  sortableFields: ["id", "name", "slug", "level", "createdAt"],
  searchableFields: ["name", "slug", "description"],
  filters: {
    isActive: { column: "is_active", operator: "=", type: "boolean" },
    level: { column: "level", operator: "=", type: "number" },
    parentId: { column: "parent_id", operator: "=", type: "number" },
  },
  columnMapping: {
    id: "id",
    name: "name",
    slug: "slug",
    description: "description",
    level: "level",
    parentId: "parent_id",
    isActive: "is_active",
    createdAt: "created_at",
    updatedAt: "updated_at",
  },
  validationRules: {
    name: "required|string|max:100",
    description: "string",
    level: "integer|min:1",
    parentId: "integer|nullable|exists:roles",
    isActive: "boolean",
  },
  createSchema: CreateRoleSchema,
  updateSchema: UpdateRoleSchema,
  toCreateColumns: (input) => ({
    name: input.name,
    slug: roleSlug(input.name),
    description: input.description,
    level: input.level,
    parent_id: input.parentId,
    is_active: toSqlBoolean(input.isActive),
  }),
  toUpdateColumns: (input) =>
    definedColumns({
      name: input.name,
      description: input.description,
      level: input.level,
      parent_id: input.parentId,
      is_active:
        input.isActive === undefined ? undefined : toSqlBoolean(input.isActive),
    }),
  conflictMessage: (input) =>
    input.name
      ? `role with slug '${roleSlug(input.name)}' already exists`
      : "role already exists",
}
