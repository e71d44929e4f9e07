/**
 * Application wiring
 *
 * Builds the services, controllers and RBAC engine over one database,
 * registers each through its contract registry and mounts everything on a
 * Hono app.
 *
 * @packageDocumentation
 */

import { Hono, type MiddlewareHandler } from "hono"
import { logger } from "hono/logger"
import { BookController } from "./books/controller.js"
import { BookService } from "./books/service.js"
import { DEFAULT_APP_CONFIG, type AppConfig } from "./config.js"
import type { ResourceEnv } from "./contracts/controller.js"
import { ContractRegistry } from "./contracts/registry.js"
import {
  COMPLETE_CRUD_SERVICE,
  type CompleteCrudService,
} from "./contracts/service.js"
import type { ResourceConfig } from "./contracts/types.js"
import type { SqliteDatabase } from "./persistence/database.js"
import { permissionMatrixEndpoints } from "./rbac/admin-endpoints.js"
import {
  PERMISSION_MATRIX_SERVICE,
  PermissionMatrixServiceImpl,
  type PermissionMatrixService,
} from "./rbac/matrix-service.js"
import { RBACServiceImpl } from "./rbac/service.js"
import { RBACAdapter } from "./rbac/sqlite-adapter.js"
import {
  MOUNTABLE_CONTROLLER,
  type MountableController,
} from "./resource/resource-controller.js"
import { RoleController } from "./roles/controller.js"
import { RoleService } from "./roles/service.js"
import { UserController } from "./users/controller.js"
import { UserService } from "./users/service.js"

export const USER_ID_HEADER = "X-User-Id"

export interface AppServices {
  db: SqliteDatabase
  config: AppConfig
  services: ContractRegistry<CompleteCrudService>
  controllers: ContractRegistry<MountableController>
  matrixServices: ContractRegistry<PermissionMatrixService>
  adapter: RBACAdapter
  rbac: RBACServiceImpl
  matrix: PermissionMatrixServiceImpl
}

export interface CreateAppOptions {
  /** Log each request through hono/logger */
  logRequests?: boolean
  /** Resolve the acting user; defaults to the X-User-Id header */
  identify?: (request: Request) => number | undefined
}

/**
 * Read a positive integer user id from the X-User-Id header
 */
export function userIdFromHeader(request: Request): number | undefined {
  const raw = request.headers.get(USER_ID_HEADER)?.trim()
  if (!raw || !/^\d+$/.test(raw)) return undefined
  const id = Number.parseInt(raw, 10)
  return id > 0 && Number.isSafeInteger(id) ? id : undefined
}

function identifyUser(
  identify: (request: Request) => number | undefined,
): MiddlewareHandler<ResourceEnv> {
  return async (c, next) => {
    c.set("userId", identify(c.req.raw))
    await next()
  }
}

/**
 * Build and register every service and controller
 *
 * @throws ContractViolationError when a component misses an operation
 */
export function createServices(
  db: SqliteDatabase,
  config: AppConfig = DEFAULT_APP_CONFIG,
): AppServices {
  const resourceConfig: ResourceConfig = {
    maxPageSize: config.maxPageSize,
    defaultPageSize: config.defaultPageSize,
    allowedPageSizes: config.allowedPageSizes,
  }

  const adapter = new RBACAdapter(db)
  const rbac = new RBACServiceImpl(adapter)
  const matrix = new PermissionMatrixServiceImpl(adapter)

  const books = BookService.fromDatabase(db, resourceConfig)
  const users = UserService.fromDatabase(db, resourceConfig)
  const roles = RoleService.fromDatabase(db, resourceConfig)

  const services = new ContractRegistry(COMPLETE_CRUD_SERVICE)
  services.mustRegister("books", books)
  services.mustRegister("users", users)
  services.mustRegister("roles", roles)

  const controllers = new ContractRegistry(MOUNTABLE_CONTROLLER)
  const controllerOptions = { allowedPageSizes: config.allowedPageSizes }
  controllers.mustRegister("books", new BookController(books, rbac, controllerOptions))
  controllers.mustRegister("users", new UserController(users, rbac, controllerOptions))
  controllers.mustRegister("roles", new RoleController(roles, rbac, controllerOptions))

  const matrixServices = new ContractRegistry(PERMISSION_MATRIX_SERVICE)
  matrixServices.mustRegister("permissions", matrix)

  return {
    db,
    config,
    services,
    controllers,
    matrixServices,
    adapter,
    rbac,
    matrix,
  }
}

/**
 * Create the HTTP app
 *
 * TESTING CHECKLIST:
 * - GET /health
 * - GET /api/contracts reports every registered component
 * - each controller is mounted at /api/<name>
 * - the matrix endpoints are mounted at /api/permissions
 */
export function createApp(
  wiring: AppServices,
  options: CreateAppOptions = {},
): Hono<ResourceEnv> {
  const app = new Hono<ResourceEnv>()

  if (options.logRequests) {
    app.use("*", logger())
  }
  app.use("*", identifyUser(options.identify ?? userIdFromHeader))

  app.get("/health", (c) => c.json({ status: "ok" }))

  app.get("/api/contracts", (c) =>
    c.json({
      services: wiring.services.validateAll(),
      controllers: wiring.controllers.validateAll(),
      matrix: wiring.matrixServices.validateAll(),
    }),
  )

  app.route(
    "/api/permissions",
    permissionMatrixEndpoints(wiring.matrixServices.get("permissions"), {
      authorizer: wiring.rbac,
    }),
  )

  for (const name of wiring.controllers.list()) {
    app.route(`/api/${name}`, wiring.controllers.get(name).routes())
  }

  app.notFound((c) => c.json({ success: false, message: "route not found" }, 404))

  return app
}
