/**
 * SQLite database handle for the admin store.
 *
 * @packageDocumentation
 */

import Database from "better-sqlite3"

export type SqliteDatabase = Database.Database

/**
 * Values better-sqlite3 can bind. Booleans are stored as 0/1.
 */
export type SqlValue = string | number | bigint | null

/**
 * Open a database with foreign keys enforced.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(path: string): SqliteDatabase {
  const db = new Database(path)
  db.pragma("foreign_keys = ON")
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL")
  }
  return db
}

export function toSqlBoolean(value: boolean): number {
  return value ? 1 : 0
}

/**
 * SQLite extended result code of an error raised by better-sqlite3
 */
export function sqliteErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code
  }
  return undefined
}

export function isUniqueViolation(error: unknown): boolean {
  const code = sqliteErrorCode(error)
  return code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY"
}

export function isForeignKeyViolation(error: unknown): boolean {
  return sqliteErrorCode(error) === "SQLITE_CONSTRAINT_FOREIGNKEY"
}
