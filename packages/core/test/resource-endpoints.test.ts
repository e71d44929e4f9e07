import type { Hono } from "hono"
import { beforeEach, describe, expect, test } from "vitest"
import {
  createApp,
  createServices,
  userIdFromHeader,
  type AppServices,
} from "../src/app.js"
import type { ResourceEnv } from "../src/contracts/controller.js"
import type { SqliteDatabase } from "../src/persistence/database.js"
import { bootstrapRBAC } from "../src/rbac/bootstrap.js"
import { RBACAdapter } from "../src/rbac/sqlite-adapter.js"
import { createTestDatabase, grantRole, insertUser } from "./helpers.js"

// ============================================
// Setup
// ============================================

interface Fixture {
  db: SqliteDatabase
  app: Hono<ResourceEnv>
  wiring: AppServices
  admin: number
  member: number
  stranger: number
}

const setup = async (): Promise<Fixture> => {
  const db = createTestDatabase()
  const wiring = createServices(db)
  await bootstrapRBAC(new RBACAdapter(db))

  const admin = insertUser(db, { name: "Root", isSuperAdmin: true })
  const member = insertUser(db, { name: "Reader" })
  const stranger = insertUser(db, { name: "Nobody" })

  const memberRole = await wiring.adapter.getRoleBySlug("member")
  if (!memberRole) throw new Error("member role was not seeded")
  grantRole(db, member, memberRole.id)

  return { db, app: createApp(wiring), wiring, admin, member, stranger }
}

const asUser = (userId: number, init: RequestInit = {}): RequestInit => ({
  ...init,
  headers: { "X-User-Id": String(userId), "Content-Type": "application/json" },
})

const post = (userId: number, body: unknown): RequestInit =>
  asUser(userId, { method: "POST", body: JSON.stringify(body) })

const DUNE = { title: "Dune", author: "Frank Herbert", isbn: "9780441013593" }

describe("resource endpoints", () => {
  let fx: Fixture

  beforeEach(async () => {
    fx = await setup()
  })

  const createBook = async (body: Record<string, unknown> = DUNE): Promise<number> => {
    const res = await fx.app.request("/api/books", post(fx.admin, body))
    const payload: unknown = await res.json()
    if (
      typeof payload === "object" &&
      payload !== null &&
      "data" in payload &&
      typeof payload.data === "object" &&
      payload.data !== null &&
      "id" in payload.data &&
      typeof payload.data.id === "number"
    ) {
      return payload.data.id
    }
    throw new Error(`book was not created: ${JSON.stringify(payload)}`)
  }

  // ============================================
  // App level
  // ============================================

  test("GET /health", async () => {
    const res = await fx.app.request("/health")
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: "ok" })
  })

  test("GET /api/contracts reports every component as valid", async () => {
    const res = await fx.app.request("/api/contracts")
    const ok = { valid: true, errors: [], missing: [] }
    expect(await res.json()).toEqual({
      services: { books: ok, roles: ok, users: ok },
      controllers: { books: ok, roles: ok, users: ok },
      matrix: { permissions: ok },
    })
  })

  test("unknown routes", async () => {
    const res = await fx.app.request("/api/nothing-here")
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ success: false, message: "route not found" })
  })

  test("userIdFromHeader", () => {
    const request = (value: string) =>
      new Request("http://localhost/", { headers: { "X-User-Id": value } })
    expect(userIdFromHeader(request(" 7 "))).toBe(7)
    expect(userIdFromHeader(request("0"))).toBeUndefined()
    expect(userIdFromHeader(request("abc"))).toBeUndefined()
    expect(userIdFromHeader(request("9007199254740992"))).toBeUndefined()
    expect(userIdFromHeader(new Request("http://localhost/"))).toBeUndefined()
  })

  // ============================================
  // Books CRUD
  // ============================================

  describe("books", () => {
    test("store answers 201", async () => {
      const res = await fx.app.request("/api/books", post(fx.admin, DUNE))
      expect(res.status).toBe(201)
      expect(await res.json()).toMatchObject({
        success: true,
        message: "Book created successfully",
        data: { title: "Dune", status: "AVAILABLE", price: 0 },
      })
    })

    test("store reports validation errors", async () => {
      const res = await fx.app.request("/api/books", post(fx.admin, { title: "Dune" }))
      expect(res.status).toBe(422)
      expect(await res.json()).toEqual({
        success: false,
        message: "Validation failed",
        errors: {
          author: "author is required",
          isbn: "isbn is required",
        },
      })
    })

    test("duplicate ISBN answers 409", async () => {
      await createBook()
      const res = await fx.app.request("/api/books", post(fx.admin, DUNE))
      expect(res.status).toBe(409)
      expect(await res.json()).toEqual({
        success: false,
        message: "a book with ISBN 9780441013593 already exists",
      })
    })

    test("show", async () => {
      const id = await createBook()
      const res = await fx.app.request(`/api/books/${id}`, asUser(fx.member))
      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({ success: true, data: { id, title: "Dune" } })
    })

    test("show of a missing book", async () => {
      const res = await fx.app.request("/api/books/99", asUser(fx.member))
      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({
        success: false,
        message: "Book with ID 99 not found",
      })
    })

    test("update through PUT and PATCH", async () => {
      const id = await createBook()
      const put = await fx.app.request(
        `/api/books/${id}`,
        asUser(fx.admin, { method: "PUT", body: JSON.stringify({ price: 9.5 }) }),
      )
      expect(await put.json()).toMatchObject({
        success: true,
        message: "Book updated successfully",
        data: { id, price: 9.5 },
      })

      const patch = await fx.app.request(
        `/api/books/${id}`,
        asUser(fx.admin, { method: "PATCH", body: JSON.stringify({ status: "MAINTENANCE" }) }),
      )
      expect(await patch.json()).toMatchObject({ data: { status: "MAINTENANCE", price: 9.5 } })
    })

    test("delete answers the deleted message", async () => {
      const id = await createBook()
      const res = await fx.app.request(`/api/books/${id}`, asUser(fx.admin, { method: "DELETE" }))
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({
        success: true,
        message: `Book with ID ${id} deleted successfully`,
      })
      const gone = await fx.app.request(`/api/books/${id}`, asUser(fx.admin))
      expect(gone.status).toBe(404)
    })

    test("index paginates and echoes the request", async () => {
      await createBook()
      await createBook({ title: "Emma", author: "Jane Austen", isbn: "9780141439587" })

      const res = await fx.app.request("/api/books?pageSize=5&sort=title&direction=asc", asUser(fx.member))
      expect(await res.json()).toMatchObject({
        success: true,
        data: [{ title: "Dune" }, { title: "Emma" }],
        pagination: {
          current_page: 1,
          last_page: 1,
          per_page: 5,
          total: 2,
          from: 1,
          to: 2,
          has_next: false,
          has_prev: false,
        },
        filters: { search: "", sort: "title", direction: "ASC" },
      })
    })

    test("index passes filters through", async () => {
      const id = await createBook()
      await createBook({ title: "Emma", author: "Jane Austen", isbn: "9780141439587" })
      await fx.app.request(`/api/books/${id}/borrow`, post(fx.member, {}))

      const res = await fx.app.request("/api/books?filters[status]=BORROWED", asUser(fx.member))
      expect(await res.json()).toMatchObject({
        data: [{ id, status: "BORROWED" }],
        pagination: { total: 1 },
        filters: { status: "BORROWED" },
      })
    })

    test("index searches", async () => {
      await createBook()
      await createBook({ title: "Emma", author: "Jane Austen", isbn: "9780141439587" })

      const res = await fx.app.request("/api/books?search=austen", asUser(fx.member))
      expect(await res.json()).toMatchObject({
        data: [{ title: "Emma" }],
        pagination: { total: 1 },
        filters: { search: "austen" },
      })
    })

    test("a one-letter search lists everything", async () => {
      await createBook()
      await createBook({ title: "Emma", author: "Jane Austen", isbn: "9780141439587" })

      const res = await fx.app.request("/api/books?search=a", asUser(fx.member))
      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({
        success: true,
        pagination: { total: 2 },
        filters: { search: "" },
      })
    })

    test("a number filter that does not parse answers 400", async () => {
      const res = await fx.app.request("/api/books?filters[minPrice]=abc", asUser(fx.member))
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        success: false,
        message: "invalid value for filter minPrice: must be a number",
        errors: { minPrice: "invalid value for filter minPrice: must be a number" },
      })
    })

    test("borrow and return", async () => {
      const id = await createBook()

      const borrowed = await fx.app.request(`/api/books/${id}/borrow`, post(fx.member, {}))
      expect(await borrowed.json()).toMatchObject({
        success: true,
        message: "Book borrowed successfully",
        data: { id, status: "BORROWED" },
      })

      const again = await fx.app.request(`/api/books/${id}/borrow`, post(fx.member, {}))
      expect(again.status).toBe(409)

      const returned = await fx.app.request(`/api/books/${id}/return`, post(fx.member, {}))
      expect(await returned.json()).toMatchObject({
        message: "Book returned successfully",
        data: { status: "AVAILABLE" },
      })
    })
  })

  // ============================================
  // Authorization
  // ============================================

  describe("authorization", () => {
    test("anonymous requests answer 401", async () => {
      const res = await fx.app.request("/api/books")
      expect(res.status).toBe(401)
      expect(await res.json()).toEqual({
        success: false,
        message: "authentication required",
      })
    })

    test("member may not create books", async () => {
      const res = await fx.app.request("/api/books", post(fx.member, DUNE))
      expect(res.status).toBe(403)
      expect(await res.json()).toEqual({
        success: false,
        message: "permission denied: books.create",
      })
    })

    test("a user without roles may not list books", async () => {
      const res = await fx.app.request("/api/books", asUser(fx.stranger))
      expect(res.status).toBe(403)
      expect(await res.json()).toEqual({
        success: false,
        message: "permission denied: books.viewAny",
      })
    })

    test("role routes use their own permission names", async () => {
      const res = await fx.app.request("/api/roles", asUser(fx.member))
      expect(res.status).toBe(403)
      expect(await res.json()).toEqual({
        success: false,
        message: "permission denied: roles.read",
      })
    })
  })

  // ============================================
  // Users and roles
  // ============================================

  describe("users and roles", () => {
    test("create a role", async () => {
      const res = await fx.app.request("/api/roles", post(fx.admin, { name: "Archivist", level: 30 }))
      expect(res.status).toBe(201)
      expect(await res.json()).toMatchObject({
        message: "Role created successfully",
        data: { name: "Archivist", slug: "archivist", level: 30, is_active: true },
      })
    })

    test("a role cannot be made its own parent", async () => {
      const created = await fx.app.request("/api/roles", post(fx.admin, { name: "Archivist" }))
      const role = await fx.wiring.adapter.getRoleBySlug("archivist")
      expect(created.status).toBe(201)
      if (!role) throw new Error("archivist role was not created")

      const res = await fx.app.request(
        `/api/roles/${role.id}`,
        asUser(fx.admin, { method: "PUT", body: JSON.stringify({ parentId: role.id }) }),
      )
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        success: false,
        message: "a role cannot be its own parent",
        errors: { parentId: "a role cannot be its own parent" },
      })
    })

    test("list users", async () => {
      const res = await fx.app.request("/api/users?sort=id&direction=asc", asUser(fx.admin))
      expect(await res.json()).toMatchObject({
        data: [{ name: "Root" }, { name: "Reader" }, { name: "Nobody" }],
        pagination: { total: 3 },
      })
    })

    test("invalid id answers 400", async () => {
      const res = await fx.app.request("/api/users/abc", asUser(fx.admin))
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        success: false,
        message: "invalid id: must be a positive integer",
        errors: { id: "invalid id: must be a positive integer" },
      })
    })
  })
})
