import { beforeEach, describe, expect, test } from "vitest"
import {
  ConflictError,
  InvalidArgumentError,
  NotFoundError,
  PartialFailureError,
  TransactionFailureError,
} from "../src/contracts/errors.js"
import { ContractRegistry } from "../src/contracts/registry.js"
import type { PermissionDefinition } from "../src/contracts/types.js"
import type { SqliteDatabase } from "../src/persistence/database.js"
import {
  PERMISSION_MATRIX_SERVICE,
  PermissionMatrixServiceImpl,
} from "../src/rbac/matrix-service.js"
import { RBACAdapter } from "../src/rbac/sqlite-adapter.js"
import {
  createTestDatabase,
  grantPermission,
  insertPermission,
  insertRole,
} from "./helpers.js"

describe("PermissionMatrixServiceImpl", () => {
  let db: SqliteDatabase
  let adapter: RBACAdapter
  let matrix: PermissionMatrixServiceImpl

  beforeEach(() => {
    db = createTestDatabase()
    adapter = new RBACAdapter(db)
    // No gate catalog, so the matrix only shows what each test inserts
    matrix = new PermissionMatrixServiceImpl(adapter, [])

    insertRole(db, { id: 5, slug: "editor", level: 50 })
    insertRole(db, { id: 6, slug: "viewer", level: 10 })
    insertRole(db, { id: 7, slug: "retired", level: 30, isActive: false })

    insertPermission(db, { id: 10, slug: "books.create" })
    insertPermission(db, { id: 11, slug: "books.view" })
    insertPermission(db, { id: 12, slug: "reports.view" })
    insertPermission(db, { id: 13, slug: "legacy.old", isActive: false })
  })

  test("conforms to the matrix contract", () => {
    const registry = new ContractRegistry(PERMISSION_MATRIX_SERVICE)
    expect(registry.register("permissions", matrix)).toEqual({ ok: true })
  })

  // ============================================
  // Matrix
  // ============================================

  describe("getPermissionMatrix", () => {
    test("bulk assign then sync leaves exactly the synced set", async () => {
      const result = await matrix.bulkAssignPermissions({
        role_id: 5,
        permission_ids: [10, 11],
        action: "assign",
      })
      expect(result).toEqual({ succeeded: 2, attempted: 2 })

      await matrix.syncRolePermissions(5, [11])

      const view = await matrix.getPermissionMatrix()
      expect(view.matrix[5]).toEqual([11])
      const editor = view.roles.find((role) => role.id === 5)
      expect(editor?.permission_ids).toEqual([11])
      expect(editor?.permission_count).toBe(1)
    })

    test("orders roles by level and groups permissions by category", async () => {
      const view = await matrix.getPermissionMatrix()

      expect(view.roles.map((role) => role.slug)).toEqual(["editor", "viewer"])
      expect(
        view.permissions.map((group) => ({
          category: group.category,
          slugs: group.permissions.map((p) => p.slug),
        })),
      ).toEqual([
        { category: "books", slugs: ["books.create", "books.view"] },
        { category: "reports", slugs: ["reports.view"] },
      ])
      expect(view.matrix).toEqual({ 5: [], 6: [] })
    })

    test("stats count inactive rows in totals only", async () => {
      grantPermission(db, 5, 10)
      grantPermission(db, 6, 11)
      grantPermission(db, 6, 12, { isActive: false })

      const view = await matrix.getPermissionMatrix()
      expect(view.stats).toEqual({
        total_roles: 3,
        total_permissions: 4,
        total_assignments: 2,
        active_roles: 2,
        active_permissions: 3,
      })
    })

    test("assignments of inactive permissions stay out of the grid", async () => {
      grantPermission(db, 5, 13)
      const view = await matrix.getPermissionMatrix()
      expect(view.matrix[5]).toEqual([])
      expect(view.stats.total_assignments).toBe(0)
    })

    test("total_assignments counts only the cells shown in the grid", async () => {
      grantPermission(db, 5, 10)
      grantPermission(db, 5, 13)
      grantPermission(db, 7, 11)

      const view = await matrix.getPermissionMatrix()
      expect(view.matrix).toEqual({ 5: [10], 6: [] })
      expect(view.stats.total_assignments).toBe(1)
      expect(await adapter.countActiveAssignments()).toBe(3)
    })

    test("syncs the gate catalog before loading", async () => {
      const catalog: PermissionDefinition[] = [
        {
          name: "View Audit Log",
          slug: "audit.view",
          category: "audit",
          resource: "audit",
          action: "view",
          description: "View the audit log",
        },
      ]
      const withGates = new PermissionMatrixServiceImpl(adapter, catalog)

      const view = await withGates.getPermissionMatrix()
      expect(view.permissions.map((group) => group.category)).toEqual([
        "audit",
        "books",
        "reports",
      ])
    })
  })

  describe("syncPermissionsFromGates", () => {
    const catalog: PermissionDefinition[] = [
      {
        name: "Old Feature",
        slug: "legacy.old",
        category: "legacy",
        resource: "legacy",
        action: "old",
        description: "Revived",
      },
      {
        name: "Export Reports",
        slug: "reports.export",
        category: "reports",
        resource: "reports",
        action: "export",
        description: "Export reports",
      },
    ]

    test("creates new slugs and updates existing ones", async () => {
      const gates = new PermissionMatrixServiceImpl(adapter, catalog)
      expect(await gates.syncPermissionsFromGates()).toEqual({
        created: 1,
        updated: 1,
      })
      expect(await gates.syncPermissionsFromGates()).toEqual({
        created: 0,
        updated: 2,
      })
    })

    test("reactivates a matched permission", async () => {
      const gates = new PermissionMatrixServiceImpl(adapter, catalog)
      await gates.syncPermissionsFromGates()

      const revived = await adapter.getPermission(13)
      expect(revived?.is_active).toBe(true)
      expect(revived?.description).toBe("Revived")
    })
  })

  // ============================================
  // Assignment
  // ============================================

  describe("assignPermissionToRole", () => {
    test("assigning twice leaves one active row", async () => {
      await matrix.assignPermissionToRole(5, 10)
      await matrix.assignPermissionToRole(5, 10)

      expect(await adapter.listRolePermissionIds(5)).toEqual([10])
      expect(await adapter.countActiveAssignments()).toBe(1)
    })

    test("reactivates an inactive assignment", async () => {
      grantPermission(db, 5, 10, { isActive: false })
      await matrix.assignPermissionToRole(5, 10)

      const row = await adapter.getRolePermission(5, 10)
      expect(row?.is_active).toBe(true)
    })

    test("rejects an inactive role", async () => {
      await expect(matrix.assignPermissionToRole(7, 10)).rejects.toThrow(
        "role not found or inactive",
      )
    })

    test("rejects an inactive permission", async () => {
      await expect(matrix.assignPermissionToRole(5, 13)).rejects.toThrow(
        "permission not found or inactive",
      )
    })
  })

  describe("validatePermissionAssignment", () => {
    test("unknown role", async () => {
      await expect(matrix.validatePermissionAssignment(99, 10)).rejects.toThrow(
        NotFoundError,
      )
    })

    test("unknown permission", async () => {
      await expect(matrix.validatePermissionAssignment(5, 99)).rejects.toThrow(
        "permission not found or inactive",
      )
    })

    test("active pair", async () => {
      await expect(matrix.validatePermissionAssignment(5, 10)).resolves.toBeUndefined()
    })
  })

  describe("revokePermissionFromRole", () => {
    test("removes the assignment", async () => {
      await matrix.assignPermissionToRole(5, 10)
      await matrix.revokePermissionFromRole(5, 10)
      expect(await adapter.getRolePermission(5, 10)).toBeUndefined()
    })

    test("revoking an absent assignment is a no-op", async () => {
      await expect(matrix.revokePermissionFromRole(5, 12)).resolves.toBeUndefined()
    })
  })

  // ============================================
  // Bulk
  // ============================================

  describe("bulkAssignPermissions", () => {
    test("rejects an unknown action", async () => {
      await expect(
        matrix.bulkAssignPermissions({ role_id: 5, permission_ids: [10], action: "grant" }),
      ).rejects.toThrow(InvalidArgumentError)
      await expect(
        matrix.bulkAssignPermissions({ role_id: 5, permission_ids: [10], action: "grant" }),
      ).rejects.toThrow("invalid action: grant")
    })

    test("rejects an empty id list", async () => {
      await expect(
        matrix.bulkAssignPermissions({ role_id: 5, permission_ids: [], action: "assign" }),
      ).rejects.toThrow("no IDs provided for bulk operation")
    })

    test("rejects duplicate ids before touching anything", async () => {
      await expect(
        matrix.bulkAssignPermissions({
          role_id: 5,
          permission_ids: [10, 11, 10],
          action: "assign",
        }),
      ).rejects.toThrow(ConflictError)
      expect(await adapter.listRolePermissionIds(5)).toEqual([])
    })

    test("stops at the first failure and keeps earlier items", async () => {
      const error = await matrix
        .bulkAssignPermissions({
          role_id: 5,
          permission_ids: [10, 99, 11],
          action: "assign",
        })
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(PartialFailureError)
      if (!(error instanceof PartialFailureError)) return
      expect(error.message).toBe(
        "1 of 3 succeeded: failed to assign permission 99: permission not found or inactive",
      )
      expect(error.succeeded).toBe(1)
      expect(error.attempted).toBe(3)
      expect(error.status).toBe(404)
      expect(await adapter.listRolePermissionIds(5)).toEqual([10])
    })

    test("revokes", async () => {
      await matrix.assignPermissionToRole(5, 10)
      await matrix.assignPermissionToRole(5, 11)

      const result = await matrix.bulkAssignPermissions({
        role_id: 5,
        permission_ids: [10, 11],
        action: "revoke",
      })
      expect(result).toEqual({ succeeded: 2, attempted: 2 })
      expect(await adapter.listRolePermissionIds(5)).toEqual([])
    })
  })

  // ============================================
  // Sync
  // ============================================

  describe("syncRolePermissions", () => {
    test("unknown role", async () => {
      await expect(matrix.syncRolePermissions(99, [10])).rejects.toThrow(
        "role 99 not found",
      )
    })

    test("replaces the set and drops duplicates", async () => {
      await matrix.assignPermissionToRole(5, 10)
      await matrix.syncRolePermissions(5, [12, 11, 12])
      expect(await adapter.listRolePermissionIds(5)).toEqual([11, 12])
    })

    test("an empty list clears the role", async () => {
      await matrix.assignPermissionToRole(5, 10)
      await matrix.syncRolePermissions(5, [])
      expect(await adapter.listRolePermissionIds(5)).toEqual([])
    })

    test("a failed insert rolls back the whole sync", async () => {
      await matrix.assignPermissionToRole(5, 10)

      await expect(matrix.syncRolePermissions(5, [11, 999])).rejects.toThrow(
        TransactionFailureError,
      )
      expect(await adapter.listRolePermissionIds(5)).toEqual([10])
    })

    test("leaves other roles alone", async () => {
      await matrix.assignPermissionToRole(6, 10)
      await matrix.syncRolePermissions(5, [11])
      expect(await adapter.listRolePermissionIds(6)).toEqual([10])
    })
  })

  // ============================================
  // Queries
  // ============================================

  describe("getRolePermissions", () => {
    test("returns active permissions in catalog order", async () => {
      await matrix.syncRolePermissions(5, [12, 13, 11, 10])
      const permissions = await matrix.getRolePermissions(5)
      expect(permissions.map((p) => p.id)).toEqual([10, 11, 12])
    })

    test("inactive role", async () => {
      await expect(matrix.getRolePermissions(7)).rejects.toThrow("role 7 not found")
    })
  })

  test("getPermissionsByCategory", async () => {
    const groups = await matrix.getPermissionsByCategory()
    expect(groups.map((g) => [g.category, g.permissions.length])).toEqual([
      ["books", 2],
      ["reports", 1],
    ])
  })
})
