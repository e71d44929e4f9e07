import {
  afterEach,
  beforeEach,
  describe,
  expect,
  test,
  vi,
  type MockInstance,
} from "vitest"
import type { SqliteDatabase } from "../src/persistence/database.js"
import { DEFAULT_ROLES, bootstrapRBAC, seedDefaults } from "../src/rbac/bootstrap.js"
import { PermissionMatrixServiceImpl } from "../src/rbac/matrix-service.js"
import { defaultPermissionRegistry } from "../src/rbac/permission-registry.js"
import { RBACAdapter } from "../src/rbac/sqlite-adapter.js"
import { createTestDatabase } from "./helpers.js"

describe("bootstrapRBAC", () => {
  let db: SqliteDatabase
  let adapter: RBACAdapter
  let warn: MockInstance<typeof console.warn>

  beforeEach(() => {
    db = createTestDatabase()
    adapter = new RBACAdapter(db)
    warn = vi.spyOn(console, "warn").mockImplementation(() => {})
  })

  afterEach(() => {
    warn.mockRestore()
  })

  test("seeds roles, both catalogs and default grants", async () => {
    const result = await bootstrapRBAC(adapter)
    expect(result).toEqual({ roles: 6, permissions: 58, assignments: 97 })
  })

  test("roles carry fixed levels, highest first", async () => {
    await bootstrapRBAC(adapter)
    const roles = await adapter.listRoles()
    expect(roles.map((r) => [r.slug, r.level])).toEqual([
      ["super-admin", 100],
      ["admin", 80],
      ["librarian", 60],
      ["moderator", 40],
      ["member", 20],
      ["guest", 10],
    ])
    expect(DEFAULT_ROLES).toHaveLength(6)
  })

  test("stores the hierarchy", async () => {
    await bootstrapRBAC(adapter)
    const parentOf = async (slug: string) => {
      const role = await adapter.getRoleBySlug(slug)
      if (!role?.parent_id) return null
      return (await adapter.getRole(role.parent_id))?.slug ?? null
    }

    expect(await parentOf("admin")).toBe("librarian")
    expect(await parentOf("librarian")).toBe("moderator")
    expect(await parentOf("moderator")).toBe("member")
    expect(await parentOf("member")).toBe("guest")
    expect(await parentOf("guest")).toBeNull()
    expect(await parentOf("super-admin")).toBeNull()
  })

  test("super-admin holds every active permission", async () => {
    await bootstrapRBAC(adapter)
    const superAdmin = await adapter.getRoleBySlug("super-admin")
    expect(superAdmin).toBeDefined()
    if (!superAdmin) return
    expect(await adapter.listRolePermissionIds(superAdmin.id)).toHaveLength(58)
  })

  test("default grants per role", async () => {
    await bootstrapRBAC(adapter)
    const matrix = new PermissionMatrixServiceImpl(adapter)
    const slugsFor = async (roleSlug: string) => {
      const role = await adapter.getRoleBySlug(roleSlug)
      if (!role) return []
      return (await matrix.getRolePermissions(role.id)).map((p) => p.slug).sort()
    }

    expect(await slugsFor("guest")).toEqual(["books.view", "books.viewAny"])
    expect(await slugsFor("member")).toEqual([
      "books.borrow",
      "books.return",
      "books.view",
      "books.viewAny",
    ])
    expect(await slugsFor("admin")).toHaveLength(14)
    expect(await slugsFor("librarian")).toHaveLength(11)
    expect(await slugsFor("moderator")).toHaveLength(8)
  })

  test("warns about default slugs with no permission", async () => {
    await bootstrapRBAC(adapter)
    expect(warn.mock.calls).toEqual([
      ["bootstrap: permission roles.viewAny not found, skipping for admin"],
      ["bootstrap: permission roles.view not found, skipping for admin"],
      ["bootstrap: permission roles.assign not found, skipping for admin"],
      ["bootstrap: permission reports.create not found, skipping for admin"],
    ])
  })

  test("running twice changes nothing", async () => {
    const first = await bootstrapRBAC(adapter)
    const second = await bootstrapRBAC(adapter)
    expect(second).toEqual(first)
    expect(await adapter.countRoles()).toEqual({ total: 6, active: 6 })
  })

  test("registry permissions are seeded too", async () => {
    const result = await bootstrapRBAC(adapter, {
      registry: defaultPermissionRegistry(),
    })
    expect(result.permissions).toBe(65)
    expect(await adapter.getPermissionBySlug("roles.read")).toBeDefined()
    // roles.view is still not a registry slug
    expect(warn).toHaveBeenCalledWith(
      "bootstrap: permission roles.view not found, skipping for admin",
    )
  })

  test("seedDefaults includes the resource registry", async () => {
    const result = await seedDefaults(adapter)
    expect(result.roles).toBe(6)
    expect(result.permissions).toBe(65)
    expect(result.assignments).toBe(await adapter.countActiveAssignments())

    const reference = new RBACAdapter(createTestDatabase())
    expect(result).toEqual(
      await bootstrapRBAC(reference, { registry: defaultPermissionRegistry() }),
    )

    const superAdmin = await adapter.getRoleBySlug("super-admin")
    const rolesRead = await adapter.getPermissionBySlug("roles.read")
    if (!superAdmin || !rolesRead) throw new Error("seed is missing rows")
    const granted = await new PermissionMatrixServiceImpl(adapter).getRolePermissions(
      superAdmin.id,
    )
    expect(granted.map((p) => p.id)).toContain(rolesRead.id)
  })
})
