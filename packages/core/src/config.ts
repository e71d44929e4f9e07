/**
 * Application configuration from environment variables.
 *
 * | Variable                      | Default                 |
 * |-------------------------------|-------------------------|
 * | `SHELFDESK_DB`                | `shelfdesk.db`          |
 * | `PORT`                        | `3000`                  |
 * | `SHELFDESK_MAX_PAGE_SIZE`     | `100`                   |
 * | `SHELFDESK_DEFAULT_PAGE_SIZE` | `20`                    |
 * | `SHELFDESK_PAGE_SIZES`        | `5,10,20,30,50,100`     |
 * | `SHELFDESK_SEED`              | `false`                 |
 *
 * @packageDocumentation
 */

import {
  array,
  check,
  forward,
  getDotPath,
  integer,
  maxValue,
  minLength,
  minValue,
  nonEmpty,
  number,
  object,
  pipe,
  safeParse,
  string,
  type InferOutput,
} from "valibot"
import { DEFAULT_RESOURCE_CONFIG } from "./contracts/types.js"

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`)
    this.name = "ConfigError"
  }
}

const pageSize = (label: string) =>
  pipe(
    number(`${label} must be a number`),
    integer(`${label} must be an integer`),
    minValue(1, `${label} must be greater than 0`),
  )

const AppConfigSchema = pipe(
  object({
    databasePath: pipe(string(), nonEmpty("SHELFDESK_DB cannot be empty")),
    port: pipe(
      number("PORT must be a number"),
      integer("PORT must be an integer"),
      minValue(1, "PORT must be between 1 and 65535"),
      maxValue(65535, "PORT must be between 1 and 65535"),
    ),
    maxPageSize: pageSize("SHELFDESK_MAX_PAGE_SIZE"),
    defaultPageSize: pageSize("SHELFDESK_DEFAULT_PAGE_SIZE"),
    allowedPageSizes: pipe(
      array(pageSize("SHELFDESK_PAGE_SIZES entry")),
      minLength(1, "SHELFDESK_PAGE_SIZES cannot be empty"),
    ),
    seedOnStart: pipe(
      string(),
      check(
        (value) => value === "true" || value === "false",
        "SHELFDESK_SEED must be true or false",
      ),
    ),
  }),
  forward(
    check(
      (config) => config.defaultPageSize <= config.maxPageSize,
      "SHELFDESK_DEFAULT_PAGE_SIZE cannot exceed SHELFDESK_MAX_PAGE_SIZE",
    ),
    ["defaultPageSize"],
  ),
)

type ParsedConfig = InferOutput<typeof AppConfigSchema>

export interface AppConfig extends Omit<ParsedConfig, "seedOnStart"> {
  seedOnStart: boolean
}

export const DEFAULT_APP_CONFIG: AppConfig = {
  databasePath: "shelfdesk.db",
  port: 3000,
  maxPageSize: DEFAULT_RESOURCE_CONFIG.maxPageSize,
  defaultPageSize: DEFAULT_RESOURCE_CONFIG.defaultPageSize,
  allowedPageSizes: DEFAULT_RESOURCE_CONFIG.allowedPageSizes,
  seedOnStart: false,
}

/**
 * "" and undefined become the fallback; anything else is parsed as a number
 * so validation can report it
 */
function numeric(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback
  return Number(value.trim())
}

function numericList(value: string | undefined, fallback: number[]): number[] {
  if (value === undefined || value.trim() === "") return [...fallback]
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "")
    .map(Number)
}

/**
 * Build the configuration from an environment
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = safeParse(AppConfigSchema, {
    databasePath: env.SHELFDESK_DB ?? DEFAULT_APP_CONFIG.databasePath,
    port: numeric(env.PORT, DEFAULT_APP_CONFIG.port),
    maxPageSize: numeric(env.SHELFDESK_MAX_PAGE_SIZE, DEFAULT_APP_CONFIG.maxPageSize),
    defaultPageSize: numeric(
      env.SHELFDESK_DEFAULT_PAGE_SIZE,
      DEFAULT_APP_CONFIG.defaultPageSize,
    ),
    allowedPageSizes: numericList(
      env.SHELFDESK_PAGE_SIZES,
      DEFAULT_APP_CONFIG.allowedPageSizes,
    ),
    seedOnStart: (env.SHELFDESK_SEED ?? "false").trim().toLowerCase(),
  })

  if (!result.success) {
    throw new ConfigError(
      result.issues.map((issue) => {
        const path = getDotPath(issue)
        return path ? `${path}: ${issue.message}` : issue.message
      }),
    )
  }

  return {
    ...result.output,
    seedOnStart: result.output.seedOnStart === "true",
  }
}
