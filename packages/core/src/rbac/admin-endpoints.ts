/**
 * Permission Matrix Admin Endpoints
 *
 * HTTP surface of the permission matrix: reading the grid, single and bulk
 * grant edits, per-role sync and the gate catalog sync.
 *
 * @packageDocumentation
 */

import { Hono, type Context } from "hono"
import {
  array,
  integer,
  minValue,
  number,
  object,
  pipe,
  string,
} from "valibot"
import type { ResourceEnv } from "../contracts/controller.js"
import {
  AuthorizationError,
  ContractError,
  InvalidArgumentError,
  PartialFailureError,
  ValidationError,
} from "../contracts/errors.js"
import {
  isRecord,
  toErrorStatus,
  type Authorizer,
} from "../resource/base-controller.js"
import { parseInput } from "../resource/resource-service.js"
import type { PermissionMatrixService } from "./matrix-service.js"

type MatrixContext = Context<ResourceEnv>

const id = (label: string) =>
  pipe(
    number(`${label} must be a number`),
    integer(`${label} must be an integer`),
    minValue(1, `${label} must be greater than 0`),
  )

const BulkRequestSchema = object({
  role_id: id("role_id"),
  permission_ids: array(id("permission id"), "permission_ids must be an array"),
  action: string("action is required"),
})

const SyncRequestSchema = object({
  permission_ids: array(id("permission id"), "permission_ids must be an array"),
})

export const MATRIX_READ_PERMISSION = "permissions.view"
export const MATRIX_WRITE_PERMISSION = "permissions.manage"

export interface MatrixEndpointOptions {
  /** Without one, every route is open */
  authorizer?: Authorizer
}

function parseIdParam(c: MatrixContext, name: string): number {
  const raw: string | undefined = c.req.param(name)
  const id = raw && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : 0
  if (id <= 0 || !Number.isSafeInteger(id)) {
    throw new InvalidArgumentError(`invalid ${name}: must be a positive integer`, name)
  }
  return id
}

async function readBody(c: MatrixContext): Promise<Record<string, unknown>> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    throw new InvalidArgumentError("invalid JSON body")
  }
  if (!isRecord(body)) {
    throw new InvalidArgumentError("invalid JSON body")
  }
  return body
}

function errorResponse(c: MatrixContext, error: unknown): Response {
  if (error instanceof ValidationError) {
    return c.json(
      { success: false, message: error.message, errors: error.errors },
      422,
    )
  }
  if (error instanceof PartialFailureError) {
    return c.json(
      {
        success: false,
        message: error.message,
        meta: { succeeded: error.succeeded, attempted: error.attempted },
      },
      toErrorStatus(error.status),
    )
  }
  if (error instanceof ContractError) {
    return c.json(
      { success: false, message: error.message },
      toErrorStatus(error.status),
    )
  }
  console.error("Permission matrix error:", error)
  return c.json({ success: false, message: "internal server error" }, 500)
}

/**
 * Create the permission matrix admin endpoints
 *
 * TESTING CHECKLIST:
 * - GET /matrix - Full grid with stats
 * - GET /categories - Active permissions grouped by category
 * - GET /roles/:roleId - Active permissions of one role
 * - POST /roles/:roleId/permissions/:permissionId - Assign (idempotent)
 * - DELETE /roles/:roleId/permissions/:permissionId - Revoke
 * - POST /bulk - Sequential assign/revoke, N of M on failure
 * - PUT /roles/:roleId/sync - Replace a role's set atomically
 * - POST /sync-gates - Upsert the gate catalog
 *
 * @example
 * ```typescript
 * const matrix = new PermissionMatrixServiceImpl(new RBACAdapter(db))
 * app.route("/api/permissions", permissionMatrixEndpoints(matrix, { authorizer: rbac }))
 * ```
 */
export function permissionMatrixEndpoints(
  service: PermissionMatrixService,
  options: MatrixEndpointOptions = {},
): Hono<ResourceEnv> {
  const router = new Hono<ResourceEnv>()
  const { authorizer } = options

  /**
   * Reads need permissions.view, everything else permissions.manage
   */
  router.use("*", async (c, next) => {
    if (!authorizer) {
      await next()
      return
    }

    const userId = c.get("userId")
    if (userId === undefined) {
      return errorResponse(
        c,
        new AuthorizationError("authentication required", 401),
      )
    }

    const permission =
      c.req.method === "GET" ? MATRIX_READ_PERMISSION : MATRIX_WRITE_PERMISSION
    if (!(await authorizer.checkPermission(userId, permission))) {
      return errorResponse(
        c,
        new AuthorizationError(`permission denied: ${permission}`, 403),
      )
    }

    await next()
  })

  const handle =
    (action: (c: MatrixContext) => Promise<Response>) =>
    async (c: MatrixContext): Promise<Response> => {
      try {
        return await action(c)
      } catch (error) {
        return errorResponse(c, error)
      }
    }

  // ==========================================
  // Reads
  // ==========================================

  router.get(
    "/matrix",
    handle(async (c) => {
      const matrix = await service.getPermissionMatrix()
      return c.json({ success: true, data: matrix })
    }),
  )

  router.get(
    "/categories",
    handle(async (c) => {
      const groups = await service.getPermissionsByCategory()
      return c.json({ success: true, data: groups })
    }),
  )

  router.get(
    "/roles/:roleId",
    handle(async (c) => {
      const permissions = await service.getRolePermissions(
        parseIdParam(c, "roleId"),
      )
      return c.json({ success: true, data: permissions })
    }),
  )

  // ==========================================
  // Single grant edits
  // ==========================================

  router.post(
    "/roles/:roleId/permissions/:permissionId",
    handle(async (c) => {
      await service.assignPermissionToRole(
        parseIdParam(c, "roleId"),
        parseIdParam(c, "permissionId"),
      )
      return c.json({ success: true, message: "Permission assigned" })
    }),
  )

  router.delete(
    "/roles/:roleId/permissions/:permissionId",
    handle(async (c) => {
      await service.revokePermissionFromRole(
        parseIdParam(c, "roleId"),
        parseIdParam(c, "permissionId"),
      )
      return c.body(null, 204)
    }),
  )

  // ==========================================
  // Bulk / sync
  // ==========================================

  /**
   * POST /bulk
   *
   * Request body:
   *   { "role_id": 5, "permission_ids": [10, 11], "action": "assign" }
   */
  router.post(
    "/bulk",
    handle(async (c) => {
      const request = parseInput(BulkRequestSchema, await readBody(c))
      const result = await service.bulkAssignPermissions(request)
      return c.json({ success: true, data: result })
    }),
  )

  /**
   * PUT /roles/:roleId/sync
   *
   * Request body:
   *   { "permission_ids": [11] }
   */
  router.put(
    "/roles/:roleId/sync",
    handle(async (c) => {
      const roleId = parseIdParam(c, "roleId")
      const { permission_ids } = parseInput(SyncRequestSchema, await readBody(c))
      await service.syncRolePermissions(roleId, permission_ids)
      return c.json({ success: true, message: "Role permissions synced" })
    }),
  )

  router.post(
    "/sync-gates",
    handle(async (c) => {
      const result = await service.syncPermissionsFromGates()
      return c.json({ success: true, data: result })
    }),
  )

  return router
}
