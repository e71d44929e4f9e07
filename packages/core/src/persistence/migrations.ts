/**
 * SQL migration runner
 *
 * Applies `NNN_name.sql` files in order and records each one, with a
 * checksum of its contents, in the migrations table. Files already recorded
 * are skipped; a recorded file whose checksum changed is reported and only
 * re-applied with `force`.
 *
 * @packageDocumentation
 */

import { createHash } from "node:crypto"
import { existsSync, readdirSync, readFileSync } from "node:fs"
import { join } from "node:path"
import { fileURLToPath } from "node:url"
import type { SqliteDatabase } from "./database.js"

export const MIGRATIONS_TABLE = "_shelfdesk_migrations"

export interface MigrationFile {
  name: string
  path: string
  checksum: string
}

export interface AppliedMigration {
  name: string
  applied_at: number
  checksum: string | null
}

export interface MigrationOptions {
  directory?: string
  force?: boolean
}

export interface MigrationReport {
  applied: string[]
  skipped: string[]
  mismatched: string[]
}

/**
 * Truncated SHA-256 of a migration's contents
 */
export function calculateChecksum(content: string): string {
  return createHash("sha256").update(content).digest("hex").substring(0, 16)
}

/**
 * Locate the bundled SQL files, both from sources and from a build
 */
export function defaultMigrationsDir(): string {
  const candidates = [
    fileURLToPath(new URL("../migrations", import.meta.url)),
    fileURLToPath(new URL("../../../src/migrations", import.meta.url)),
  ]
  return candidates.find((dir) => existsSync(dir)) ?? candidates[0]
}

export function getMigrationFiles(directory: string): MigrationFile[] {
  if (!existsSync(directory)) {
    return []
  }

  return readdirSync(directory)
    .filter((f) => f.endsWith(".sql") && /^\d{3}_/.test(f))
    .sort()
    .map((name) => {
      const path = join(directory, name)
      return {
        name,
        path,
        checksum: calculateChecksum(readFileSync(path, "utf-8")),
      }
    })
}

function ensureMigrationsTable(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      name TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL,
      checksum TEXT
    )
  `)
}

export function getAppliedMigrations(db: SqliteDatabase): AppliedMigration[] {
  ensureMigrationsTable(db)
  return db
    .prepare<[], AppliedMigration>(
      `SELECT name, applied_at, checksum FROM ${MIGRATIONS_TABLE} ORDER BY name`,
    )
    .all()
}

export function applyMigrations(
  db: SqliteDatabase,
  options: MigrationOptions = {},
): MigrationReport {
  const directory = options.directory ?? defaultMigrationsDir()
  const applied = new Map(
    getAppliedMigrations(db).map((migration) => [migration.name, migration]),
  )
  const report: MigrationReport = { applied: [], skipped: [], mismatched: [] }

  const record = db.prepare<[string, number, string]>(
    `INSERT OR REPLACE INTO ${MIGRATIONS_TABLE} (name, applied_at, checksum) VALUES (?, ?, ?)`,
  )

  for (const migration of getMigrationFiles(directory)) {
    const existing = applied.get(migration.name)
    if (existing && !options.force) {
      if (existing.checksum !== null && existing.checksum !== migration.checksum) {
        console.warn(
          `Migration ${migration.name} changed since it was applied (applied ${existing.checksum}, current ${migration.checksum})`,
        )
        report.mismatched.push(migration.name)
      } else {
        report.skipped.push(migration.name)
      }
      continue
    }

    const sql = readFileSync(migration.path, "utf-8")
    db.transaction(() => {
      db.exec(sql)
      record.run(migration.name, Date.now(), migration.checksum)
    })()
    report.applied.push(migration.name)
  }

  return report
}
