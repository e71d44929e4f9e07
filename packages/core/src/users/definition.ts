/**
 * User resource definition.
 *
 * @packageDocumentation
 */

import {
  boolean,
  email,
  maxLength,
  nonEmpty,
  object,
  optional,
  pipe,
  string,
  toLowerCase,
  trim,
  type InferOutput,
} from "valibot"
import type { User } from "../contracts/types.js"
import { toSqlBoolean } from "../persistence/database.js"
import type { TableMapping } from "../persistence/repository.js"
import {
  definedColumns,
  type ResourceDefinition,
} from "../resource/resource-service.js"

const name = pipe(
  string("name is required"),
  trim(),
  nonEmpty("name is required"),
  maxLength(255, "name cannot exceed 255 characters"),
)
const emailAddress = pipe(
  string("email is required"),
  trim(),
  nonEmpty("email is required"),
  email("invalid email format"),
  toLowerCase(),
)
const flag = (field: string) => boolean(`${field} must be a boolean`)

export const CreateUserSchema = object({
  name,
  email: emailAddress,
  isActive: optional(flag("isActive"), true),
  isSuperAdmin: optional(flag("isSuperAdmin"), false),
})

export const UpdateUserSchema = object({
  name: optional(name),
  email: optional(emailAddress),
  isActive: optional(flag("isActive")),
  isSuperAdmin: optional(flag("isSuperAdmin")),
})

export type CreateUserInput = InferOutput<typeof CreateUserSchema>
export type UpdateUserInput = InferOutput<typeof UpdateUserSchema>

export interface UserRow {
  id: number
  name: string
  email: string
  is_active: number
  is_super_admin: number
  created_at: number
  updated_at: number
}

export const USER_TABLE: TableMapping<User, UserRow> = {
  table: "users",
  primaryKey: "id",
  columns: [
    "name",
    "email",
    "is_active",
    "is_super_admin",
    "created_at",
    "updated_at",
  ],
  timestamps: true,
  fromRow: (row) => ({
    id: row.id,
    name: row.name,
    email: row.email,
    is_active: row.is_active === 1,
    is_super_admin: row.is_super_admin === 1,
    created_at: row.created_at,
    updated_at: row.updated_at,
  }),
}

const optionalFlag = (value: boolean | undefined) =>
  value === undefined ? undefined : toSqlBoolean(value)

export const USER_RESOURCE: ResourceDefinition<
  User,
  CreateUserInput,
  UpdateUserInput
> = {
  name: "users",
  title: "User",
  version: "1.0.0",
  description: "User account management",
  tableName: "users",
  sortableFields: [
    "id",
    "name",
    "email",
    "isActive",
    "isSuperAdmin",
    "createdAt",
    "updatedAt",
  ],
  searchableFields: ["name", "email"],
  filters: {
    name: { column: "name", operator: "=", type: "string" },
    email: { column: "email", operator: "=", type: "string" },
    isActive: { column: "is_active", operator: "=", type: "boolean" },
    isSuperAdmin: { column: "is_super_admin", operator: "=", type: "boolean" },
  },
  columnMapping: {
    id: "id",
    name: "name",
    email: "email",
    isActive: "is_active",
    isSuperAdmin: "is_super_admin",
    createdAt: "created_at",
    updatedAt: "updated_at",
  },
  validationRules: {
    name: "required|string|max:255",
    email: "required|email|unique",
    isActive: "boolean",
    isSuperAdmin: "boolean",
  },
  createSchema: CreateUserSchema,
  updateSchema: UpdateUserSchema,
  toCreateColumns: (input) => ({
    name: input.name,
    email: input.email,
    is_active: toSqlBoolean(input.isActive),
    is_super_admin: toSqlBoolean(input.isSuperAdmin),
  }),
  toUpdateColumns: (input) =>
    definedColumns({
      name: input.name,
      email: input.email,
      is_active: optionalFlag(input.isActive),
      is_super_admin: optionalFlag(input.isSuperAdmin),
    }),
  conflictMessage: (input) =>
    input.email
      ? `a user with email ${input.email} already exists`
      : "a user with this email already exists",
}
