import { Hono } from "hono"
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  test,
  vi,
  type MockInstance,
} from "vitest"
import type { ResourceContext, ResourceEnv } from "../contracts/controller.js"
import {
  ConflictError,
  NotFoundError,
  PartialFailureError,
  ValidationError,
} from "../contracts/errors.js"
import {
  BaseResourceController,
  toErrorStatus,
  type Authorizer,
} from "./base-controller.js"

// ============================================
// Test Controller
// ============================================

const FAILURES: Record<number, Error> = {
  1: new NotFoundError("Item with ID 1 not found"),
  2: new ValidationError({ name: "name is required" }),
  3: new ConflictError("item already exists"),
  4: new PartialFailureError(1, 3, new NotFoundError("Item with ID 9 not found")),
  5: new Error("boom"),
}

class ItemsController extends BaseResourceController {
  constructor(authorizer?: Authorizer) {
    super({
      resourceType: "items",
      title: "Item",
      permissions: {
        index: "items.viewAny",
        show: "items.view",
        store: "items.create",
        update: "items.update",
        delete: "items.delete",
        archive: "items.archive",
      },
      validationRules: { name: "required|string" },
      authorizer,
    })
  }

  private async run(c: ResourceContext, action: () => Promise<Response>) {
    try {
      return await action()
    } catch (error) {
      return this.handleError(c, error)
    }
  }

  async index(c: ResourceContext): Promise<Response> {
    return this.run(c, async () => {
      await this.authorize(c, "index")
      return c.json(this.validatePaginationRequest(c))
    })
  }

  async show(c: ResourceContext): Promise<Response> {
    return this.run(c, async () => {
      const id = this.validateId(c)
      const failure = FAILURES[id]
      if (failure) throw failure
      return this.successResponse(c, { id })
    })
  }

  async store(c: ResourceContext): Promise<Response> {
    return this.run(c, async () =>
      this.createdResponse(c, await this.validateCreateRequest(c)),
    )
  }

  async update(c: ResourceContext): Promise<Response> {
    return this.run(c, async () => {
      const id = this.validateId(c)
      const data = await this.validateUpdateRequest(c)
      return this.resourceUpdatedResponse(c, { id, ...data })
    })
  }

  async delete(c: ResourceContext): Promise<Response> {
    return this.run(c, async () => {
      this.validateId(c)
      return this.noContentResponse(c)
    })
  }
}

const createApp = (controller: ItemsController) => {
  const app = new Hono<ResourceEnv>()
  app.use("*", async (c, next) => {
    const raw = c.req.header("X-User-Id")
    c.set("userId", raw ? Number(raw) : undefined)
    await next()
  })
  app.get("/items", (c) => controller.index(c))
  app.get("/items/permissions", async (c) =>
    c.json(await controller.buildPermissionsMap(c)),
  )
  app.get("/items/:id", (c) => controller.show(c))
  app.post("/items", (c) => controller.store(c))
  app.put("/items/:id", (c) => controller.update(c))
  app.delete("/items/:id", (c) => controller.delete(c))
  return app
}

const jsonRequest = (method: string, body: string): RequestInit => ({
  method,
  body,
  headers: { "Content-Type": "application/json" },
})

describe("BaseResourceController", () => {
  let app: Hono<ResourceEnv>

  beforeEach(() => {
    app = createApp(new ItemsController())
  })

  // ============================================
  // Pagination
  // ============================================

  describe("validatePaginationRequest", () => {
    test("parses every parameter", async () => {
      const res = await app.request(
        "/items?page=2&pageSize=50&sort=title&direction=asc&search=%20dune%20&filters[status]=AVAILABLE",
      )
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({
        page: 2,
        pageSize: 50,
        sort: "title",
        direction: "ASC",
        search: "dune",
        filters: { status: "AVAILABLE" },
      })
    })

    test("defaults", async () => {
      const res = await app.request("/items")
      expect(await res.json()).toEqual({
        page: 1,
        pageSize: 20,
        sort: "id",
        direction: "DESC",
        search: "",
        filters: {},
      })
    })

    test("rejects page 0", async () => {
      const res = await app.request("/items?page=0")
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        success: false,
        message: "page must be greater than 0",
        errors: { page: "page must be greater than 0" },
      })
    })

    test("non-numeric page becomes 1", async () => {
      const res = await app.request("/items?page=abc")
      expect(await res.json()).toMatchObject({ page: 1 })
    })

    test.each([
      ["7", 20],
      ["500", 20],
      ["-5", 20],
      ["ten", 20],
      ["100", 100],
      ["5", 5],
    ])("pageSize %s becomes %i", async (raw, expected) => {
      const res = await app.request(`/items?pageSize=${raw}`)
      expect(await res.json()).toMatchObject({ pageSize: expected })
    })

    test("unknown direction becomes DESC", async () => {
      const res = await app.request("/items?direction=sideways")
      expect(await res.json()).toMatchObject({ direction: "DESC" })
    })

    test("getPaginationDefaults follows setPaginationConfig", () => {
      const controller = new ItemsController()
      controller.setPaginationConfig(10, 50, [10, 25, 50])
      expect(controller.getPaginationDefaults().pageSize).toBe(10)
      expect(controller.generateMetadata().pagination_config).toEqual({
        default_page_size: 10,
        max_page_size: 50,
        allowed_sizes: [10, 25, 50],
      })
    })
  })

  // ============================================
  // Validation
  // ============================================

  describe("validateId", () => {
    test.each([
      ["abc", "invalid id: must be a positive integer"],
      ["1.5", "invalid id: must be a positive integer"],
      ["0", "invalid id: must be greater than 0"],
      ["-3", "invalid id: must be greater than 0"],
      ["9007199254740992", "invalid id: must be a positive integer"],
      ["99999999999999999999", "invalid id: must be a positive integer"],
    ])("%s", async (raw, message) => {
      const res = await app.request(`/items/${raw}`)
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        success: false,
        message,
        errors: { id: message },
      })
    })

    test("valid id", async () => {
      const res = await app.request("/items/42")
      expect(await res.json()).toEqual({ success: true, data: { id: 42 } })
    })

    test("largest safe id", async () => {
      const res = await app.request("/items/9007199254740991")
      expect(await res.json()).toEqual({
        success: true,
        data: { id: 9007199254740991 },
      })
    })
  })

  describe("request bodies", () => {
    test("store answers 201 with the parsed body", async () => {
      const res = await app.request("/items", jsonRequest("POST", '{"name":"lamp"}'))
      expect(res.status).toBe(201)
      expect(await res.json()).toEqual({ success: true, data: { name: "lamp" } })
    })

    test("malformed JSON", async () => {
      const res = await app.request("/items", jsonRequest("POST", "{name"))
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        success: false,
        message: "invalid JSON body",
      })
    })

    test("a JSON array is not an object body", async () => {
      const res = await app.request("/items", jsonRequest("POST", "[1,2]"))
      expect(res.status).toBe(400)
    })

    test("update message", async () => {
      const res = await app.request("/items/3", jsonRequest("PUT", '{"name":"desk"}'))
      expect(await res.json()).toEqual({
        success: true,
        data: { id: 3, name: "desk" },
        message: "Item updated successfully",
      })
    })

    test("no content", async () => {
      const res = await app.request("/items/3", { method: "DELETE" })
      expect(res.status).toBe(204)
      expect(await res.text()).toBe("")
    })
  })

  // ============================================
  // Error mapping
  // ============================================

  describe("handleError", () => {
    let consoleError: MockInstance<typeof console.error>

    beforeEach(() => {
      consoleError = vi.spyOn(console, "error").mockImplementation(() => {})
    })

    afterEach(() => {
      consoleError.mockRestore()
    })

    test("not found", async () => {
      const res = await app.request("/items/1")
      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({
        success: false,
        message: "Item with ID 1 not found",
      })
    })

    test("validation", async () => {
      const res = await app.request("/items/2")
      expect(res.status).toBe(422)
      expect(await res.json()).toEqual({
        success: false,
        message: "Validation failed",
        errors: { name: "name is required" },
      })
    })

    test("conflict", async () => {
      const res = await app.request("/items/3")
      expect(res.status).toBe(409)
    })

    test("partial failure keeps the inner status and reports counts", async () => {
      const res = await app.request("/items/4")
      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({
        success: false,
        message: "1 of 3 succeeded: Item with ID 9 not found",
        meta: { succeeded: 1, attempted: 3 },
      })
    })

    test("unexpected errors are logged and hidden", async () => {
      const res = await app.request("/items/5")
      expect(res.status).toBe(500)
      expect(await res.json()).toEqual({
        success: false,
        message: "internal server error",
      })
      expect(consoleError).toHaveBeenCalledWith("items controller error:", FAILURES[5])
    })

    test("toErrorStatus", () => {
      expect(toErrorStatus(404)).toBe(404)
      expect(toErrorStatus(418)).toBe(500)
    })
  })

  // ============================================
  // Authorization
  // ============================================

  describe("authorization", () => {
    const authorizer: Authorizer = {
      checkPermission: async (userId, permission) =>
        userId === 1 && permission !== "items.delete",
    }

    beforeEach(() => {
      app = createApp(new ItemsController(authorizer))
    })

    test("anonymous request", async () => {
      const res = await app.request("/items")
      expect(res.status).toBe(401)
      expect(await res.json()).toEqual({
        success: false,
        message: "authentication required",
      })
    })

    test("missing grant", async () => {
      const res = await app.request("/items", { headers: { "X-User-Id": "2" } })
      expect(res.status).toBe(403)
      expect(await res.json()).toEqual({
        success: false,
        message: "permission denied: items.viewAny",
      })
    })

    test("granted", async () => {
      const res = await app.request("/items", { headers: { "X-User-Id": "1" } })
      expect(res.status).toBe(200)
    })

    test("buildPermissionsMap covers standard and custom actions", async () => {
      const res = await app.request("/items/permissions", {
        headers: { "X-User-Id": "1" },
      })
      expect(await res.json()).toEqual({
        list: true,
        read: true,
        create: true,
        update: true,
        delete: false,
        archive: true,
      })
    })

    test("without an authorizer everything is allowed", async () => {
      const open = createApp(new ItemsController())
      const res = await open.request("/items/permissions")
      expect(await res.json()).toEqual({
        list: true,
        read: true,
        create: true,
        update: true,
        delete: true,
        archive: true,
      })
    })
  })

  test("generateMetadata", () => {
    const metadata = new ItemsController().generateMetadata()
    expect(metadata).toEqual({
      resource_type: "items",
      supported_actions: ["index", "show", "store", "update", "delete", "archive"],
      required_permissions: {
        index: "items.viewAny",
        show: "items.view",
        store: "items.create",
        update: "items.update",
        delete: "items.delete",
        archive: "items.archive",
      },
      validation_rules: { name: "required|string" },
      pagination_config: {
        default_page_size: 20,
        max_page_size: 100,
        allowed_sizes: [5, 10, 20, 30, 50, 100],
      },
      response_formats: ["json"],
    })
  })
})
