#!/usr/bin/env node
/**
 * shelfdesk CLI
 *
 * Usage:
 *   shelfdesk migrate [db-path] [--force] [--seed]
 *   shelfdesk seed [db-path]
 *   shelfdesk validate
 *   shelfdesk matrix [db-path]
 *   shelfdesk serve [db-path] [--port <n>] [--seed]
 *
 * The database path defaults to SHELFDESK_DB, then shelfdesk.db.
 */

import { serve as serveNode } from "@hono/node-server"
import { createApp, createServices } from "../src/app.js"
import { loadConfig, type AppConfig } from "../src/config.js"
import { openDatabase, type SqliteDatabase } from "../src/persistence/database.js"
import { applyMigrations } from "../src/persistence/migrations.js"
import { seedDefaults } from "../src/rbac/bootstrap.js"
import { RBACAdapter } from "../src/rbac/sqlite-adapter.js"
import {
  formatContractReport,
  formatMatrixTable,
  parseArgs,
  type ParsedArgs,
} from "./cli-utils.js"

function resolveConfig(parsed: ParsedArgs): AppConfig {
  const config = loadConfig(process.env)
  return {
    ...config,
    databasePath: parsed.dbPath ?? config.databasePath,
    port: parsed.port ?? config.port,
    seedOnStart: parsed.withSeed || config.seedOnStart,
  }
}

function migrateDatabase(db: SqliteDatabase, force: boolean): void {
  const report = applyMigrations(db, { force })
  for (const name of report.applied) {
    console.log(`  ✓ ${name}`)
  }
  for (const name of report.skipped) {
    console.log(`  - ${name} (already applied)`)
  }
  for (const name of report.mismatched) {
    console.log(`  ! ${name} (checksum changed, rerun with --force)`)
  }
}

async function seedDatabase(db: SqliteDatabase): Promise<void> {
  const result = await seedDefaults(new RBACAdapter(db))
  console.log(
    `Seeded ${result.roles} roles, ${result.permissions} permissions, ${result.assignments} assignments`,
  )
}

async function migrate(args: string[]): Promise<void> {
  const parsed = parseArgs(args)
  const config = resolveConfig(parsed)

  console.log(`\nshelfdesk migration - ${config.databasePath}`)
  console.log("=".repeat(50))

  const db = openDatabase(config.databasePath)
  try {
    migrateDatabase(db, parsed.force)
    if (config.seedOnStart) {
      await seedDatabase(db)
    }
  } finally {
    db.close()
  }
}

async function seed(args: string[]): Promise<void> {
  const config = resolveConfig(parseArgs(args))
  const db = openDatabase(config.databasePath)
  try {
    migrateDatabase(db, false)
    await seedDatabase(db)
  } finally {
    db.close()
  }
}

/**
 * Build every component against a throwaway database and report conformance
 */
function validate(): void {
  const db = openDatabase(":memory:")
  try {
    applyMigrations(db)
    const wiring = createServices(db)
    const reports = [
      formatContractReport(
        `Services (${wiring.services.contractName})`,
        wiring.services.validateAll(),
      ),
      formatContractReport(
        `Controllers (${wiring.controllers.contractName})`,
        wiring.controllers.validateAll(),
      ),
      formatContractReport(
        `Matrix (${wiring.matrixServices.contractName})`,
        wiring.matrixServices.validateAll(),
      ),
    ]
    console.log(reports.join("\n\n"))
  } finally {
    db.close()
  }
  console.log("\nAll components conform.")
}

async function matrix(args: string[]): Promise<void> {
  const config = resolveConfig(parseArgs(args))
  const db = openDatabase(config.databasePath)
  try {
    applyMigrations(db)
    const wiring = createServices(db, config)
    console.log(formatMatrixTable(await wiring.matrix.getPermissionMatrix()))
  } finally {
    db.close()
  }
}

async function serve(args: string[]): Promise<void> {
  const config = resolveConfig(parseArgs(args))
  const db = openDatabase(config.databasePath)
  migrateDatabase(db, false)
  if (config.seedOnStart) {
    await seedDatabase(db)
  }

  const app = createApp(createServices(db, config), { logRequests: true })
  serveNode({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(`shelfdesk listening on http://localhost:${info.port}`)
  })
}

function printHelp(): void {
  console.log(`
shelfdesk - admin resources and permission matrix

Commands:
  migrate [db-path] [--force] [--seed]   Apply SQL migrations
  seed [db-path]                         Migrate, then seed roles and permissions
  validate                               Check every component against its contract
  matrix [db-path]                       Print the role x permission grid
  serve [db-path] [--port <n>] [--seed]  Start the HTTP server

Environment:
  SHELFDESK_DB, PORT, SHELFDESK_MAX_PAGE_SIZE, SHELFDESK_DEFAULT_PAGE_SIZE,
  SHELFDESK_PAGE_SIZES, SHELFDESK_SEED
`)
}

async function main(args: string[]): Promise<void> {
  const command = args[0]

  switch (command) {
    case "migrate":
      await migrate(args.slice(1))
      break
    case "seed":
      await seed(args.slice(1))
      break
    case "validate":
      validate()
      break
    case "matrix":
      await matrix(args.slice(1))
      break
    case "serve":
      await serve(args.slice(1))
      break
    case "help":
    case "--help":
    case "-h":
      printHelp()
      break
    default:
      if (command) {
        console.error(`Unknown command: ${command}`)
      }
      printHelp()
      process.exit(command ? 1 : 0)
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(error instanceof Error ? `Error: ${error.message}` : error)
  process.exit(1)
})
