/**
 * CLI Utility Functions
 *
 * Pure functions extracted for testability.
 */

import type { ContractCheck } from "../src/contracts/registry.js"
import type { PermissionMatrix } from "../src/contracts/types.js"

export { calculateChecksum } from "../src/persistence/migrations.js"

export interface ParsedArgs {
  dbPath?: string
  port?: number
  withSeed: boolean
  force: boolean
}

/**
 * Parse command arguments (everything after the command name)
 *
 * A bare argument is taken as the database path. An unparsable --port is
 * left unset so configuration falls back to PORT.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    withSeed: false,
    force: false,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === undefined) continue
    if (arg === "--seed") {
      result.withSeed = true
    } else if (arg === "--no-seed") {
      result.withSeed = false
    } else if (arg === "--force") {
      result.force = true
    } else if (arg === "--db" || arg === "-d") {
      result.dbPath = args[++i]
    } else if (arg === "--port" || arg === "-p") {
      const port = Number.parseInt(args[++i] ?? "", 10)
      result.port = Number.isNaN(port) ? undefined : port
    } else if (!arg.startsWith("-")) {
      result.dbPath = arg
    }
  }

  return result
}

/**
 * One line per registered component, failures listing what is missing
 */
export function formatContractReport(
  title: string,
  report: Record<string, ContractCheck>,
): string {
  const lines = [title]
  const names = Object.keys(report)
  if (names.length === 0) {
    lines.push("  (none registered)")
  }
  for (const name of names) {
    const check = report[name]
    if (!check) continue
    lines.push(
      check.valid
        ? `  ✓ ${name}`
        : `  ✗ ${name}: missing ${check.missing.join(", ")}`,
    )
  }
  return lines.join("\n")
}

/**
 * Render the matrix as a permission x role grid, "x" marking a grant
 */
export function formatMatrixTable(matrix: PermissionMatrix): string {
  const permissions = matrix.permissions.flatMap((group) => group.permissions)
  const width = Math.max(
    "permission".length,
    ...permissions.map((permission) => permission.slug.length),
  )

  const header = ["permission".padEnd(width), ...matrix.roles.map((r) => r.slug)]
  const lines = [header.join("  ").trimEnd()]

  for (const permission of permissions) {
    const cells = matrix.roles.map((role) =>
      (role.permission_ids.includes(permission.id) ? "x" : ".").padEnd(
        role.slug.length,
      ),
    )
    lines.push([permission.slug.padEnd(width), ...cells].join("  ").trimEnd())
  }

  const { stats } = matrix
  lines.push(
    `${stats.total_roles} roles, ${stats.total_permissions} permissions, ${stats.total_assignments} assignments`,
  )
  return lines.join("\n")
}
