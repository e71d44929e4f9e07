import type { SqliteDatabase } from "../src/persistence/database.js"
import { openDatabase } from "../src/persistence/database.js"
import { applyMigrations } from "../src/persistence/migrations.js"

// ============================================
// Database
// ============================================

export const createTestDatabase = (): SqliteDatabase => {
  const db = openDatabase(":memory:")
  applyMigrations(db)
  return db
}

// ============================================
// Test Data Factories
// ============================================

export interface UserSeed {
  id?: number
  name?: string
  email?: string
  isActive?: boolean
  isSuperAdmin?: boolean
}

let emailCounter = 0

export const insertUser = (db: SqliteDatabase, seed: UserSeed = {}): number => {
  emailCounter++
  const now = Date.now()
  const result = db
    .prepare<[number | null, string, string, number, number, number, number]>(
      `INSERT INTO users (id, name, email, is_active, is_super_admin, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      seed.id ?? null,
      seed.name ?? "Test User",
      seed.email ?? `user${emailCounter}@example.com`,
      seed.isActive === false ? 0 : 1,
      seed.isSuperAdmin ? 1 : 0,
      now,
      now,
    )
  return Number(result.lastInsertRowid)
}

export interface RoleSeed {
  id?: number
  slug: string
  name?: string
  level?: number
  isActive?: boolean
}

export const insertRole = (db: SqliteDatabase, seed: RoleSeed): number => {
  const now = Date.now()
  const result = db
    .prepare<[number | null, string, string, number, number, number, number]>(
      `INSERT INTO roles (id, name, slug, level, is_active, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      seed.id ?? null,
      seed.name ?? seed.slug,
      seed.slug,
      seed.level ?? 10,
      seed.isActive === false ? 0 : 1,
      now,
      now,
    )
  return Number(result.lastInsertRowid)
}

export interface PermissionSeed {
  id?: number
  slug: string
  isActive?: boolean
  requiresOwnership?: boolean
}

/**
 * Category and action are taken from a dotted slug
 */
export const insertPermission = (
  db: SqliteDatabase,
  seed: PermissionSeed,
): number => {
  const [resource = seed.slug, action = ""] = seed.slug.split(".")
  const now = Date.now()
  const result = db
    .prepare<
      [number | null, string, string, string, string, string, number, number, number, number]
    >(
      `INSERT INTO permissions (id, name, slug, category, resource, action, is_active, requires_ownership, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      seed.id ?? null,
      seed.slug,
      seed.slug,
      resource,
      resource,
      action,
      seed.isActive === false ? 0 : 1,
      seed.requiresOwnership ? 1 : 0,
      now,
      now,
    )
  return Number(result.lastInsertRowid)
}

export const grantRole = (
  db: SqliteDatabase,
  userId: number,
  roleId: number,
  options: { expiresAt?: number | null; isActive?: boolean } = {},
): void => {
  db.prepare<[number, number, number, number | null, number]>(
    `INSERT INTO user_roles (user_id, role_id, assigned_at, expires_at, is_active)
     VALUES (?, ?, ?, ?, ?)`,
  ).run(
    userId,
    roleId,
    Date.now(),
    options.expiresAt ?? null,
    options.isActive === false ? 0 : 1,
  )
}

export const grantPermission = (
  db: SqliteDatabase,
  roleId: number,
  permissionId: number,
  options: { isActive?: boolean } = {},
): void => {
  db.prepare<[number, number, number, number]>(
    `INSERT INTO role_permissions (role_id, permission_id, is_active, granted_at)
     VALUES (?, ?, ?, ?)`,
  ).run(roleId, permissionId, options.isActive === false ? 0 : 1, Date.now())
}
