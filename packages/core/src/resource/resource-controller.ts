/**
 * Resource Controller
 *
 * The five REST actions over any CompleteCrudService, plus the Hono router
 * that exposes them.
 *
 * @packageDocumentation
 */

import { Hono } from "hono"
import {
  RESOURCE_CONTROLLER,
  type ResourceContext,
  type ResourceControllerContract,
  type ResourceEnv,
} from "../contracts/controller.js"
import type { ContractDefinition } from "../contracts/registry.js"
import type { CompleteCrudService } from "../contracts/service.js"
import {
  BaseResourceController,
  DEFAULT_PAGINATION_CONFIG,
  type ActionPermissions,
  type Authorizer,
} from "./base-controller.js"
import { MIN_SEARCH_LENGTH } from "./base-service.js"

export interface ResourceControllerOptions {
  resourceType: string
  title: string
  /** Defaults to `<resourceType>.viewAny`, `.view`, `.create`, `.update`, `.delete` */
  permissions?: Partial<ActionPermissions>
  allowedPageSizes?: number[]
  authorizer?: Authorizer
}

/**
 * A controller that can also be mounted on the app
 */
export interface MountableController extends ResourceControllerContract {
  routes(): Hono<ResourceEnv>
}

export const MOUNTABLE_CONTROLLER: ContractDefinition<MountableController> = {
  ...RESOURCE_CONTROLLER,
  name: "MountableController",
  operations: [...RESOURCE_CONTROLLER.operations, "routes"],
}

export type ControllerSettings = Pick<ResourceControllerOptions, "allowedPageSizes">

export function defaultActionPermissions(resource: string): ActionPermissions {
  return {
    index: `${resource}.viewAny`,
    show: `${resource}.view`,
    store: `${resource}.create`,
    update: `${resource}.update`,
    delete: `${resource}.delete`,
  }
}

/**
 * ResourceController
 *
 * TESTING CHECKLIST:
 * - each action answers 403 "permission denied: <slug>" without the grant
 * - index passes search and filters[...] through to the service
 * - a search shorter than MIN_SEARCH_LENGTH is ignored rather than rejected
 * - store answers 201, delete answers the deleted message
 * - service errors map through handleError
 */
export class ResourceController<T>
  extends BaseResourceController
  implements MountableController
{
  protected service: CompleteCrudService<T>

  constructor(service: CompleteCrudService<T>, options: ResourceControllerOptions) {
    const permissions: ActionPermissions = {
      ...defaultActionPermissions(options.resourceType),
    }
    for (const [action, slug] of Object.entries(options.permissions ?? {})) {
      if (slug !== undefined) permissions[action] = slug
    }

    super({
      resourceType: options.resourceType,
      title: options.title,
      permissions,
      validationRules: service.getValidationRules(),
      pagination: {
        default_page_size: service.getDefaultPageSize(),
        max_page_size: service.getMaxPageSize(),
        allowed_sizes:
          options.allowedPageSizes ?? DEFAULT_PAGINATION_CONFIG.allowed_sizes,
      },
      authorizer: options.authorizer,
    })
    this.service = service
  }

  // ============================================
  // ACTIONS
  // ============================================

  async index(c: ResourceContext): Promise<Response> {
    return this.handle(c, async () => {
      await this.authorize(c, "index")
      const requested = this.validatePaginationRequest(c)
      // A term too short to search lists everything instead
      const searching = requested.search.trim().length >= MIN_SEARCH_LENGTH
      const request = searching ? requested : { ...requested, search: "" }
      const result = searching
        ? await this.service.search(request.search, request)
        : await this.service.getListAdvanced(request, request.filters)
      return this.buildPaginatedResponse(c, result, request)
    })
  }

  async show(c: ResourceContext): Promise<Response> {
    return this.handle(c, async () => {
      await this.authorize(c, "show")
      const id = this.validateId(c)
      return this.successResponse(c, await this.service.getById(id))
    })
  }

  async store(c: ResourceContext): Promise<Response> {
    return this.handle(c, async () => {
      await this.authorize(c, "store")
      const data = await this.validateCreateRequest(c)
      return this.resourceCreatedResponse(c, await this.service.create(data))
    })
  }

  async update(c: ResourceContext): Promise<Response> {
    return this.handle(c, async () => {
      await this.authorize(c, "update")
      const id = this.validateId(c)
      const data = await this.validateUpdateRequest(c)
      return this.resourceUpdatedResponse(c, await this.service.update(id, data))
    })
  }

  async delete(c: ResourceContext): Promise<Response> {
    return this.handle(c, async () => {
      await this.authorize(c, "delete")
      const id = this.validateId(c)
      await this.service.delete(id)
      return this.resourceDeletedResponse(c, id)
    })
  }

  /**
   * Run an action, mapping anything it throws to an error response
   */
  protected async handle(
    c: ResourceContext,
    action: () => Promise<Response>,
  ): Promise<Response> {
    try {
      return await action()
    } catch (error) {
      return this.handleError(c, error)
    }
  }

  // ============================================
  // ROUTES
  // ============================================

  routes(): Hono<ResourceEnv> {
    const router = new Hono<ResourceEnv>()
    router.get("/", (c) => this.index(c))
    router.get("/:id", (c) => this.show(c))
    router.post("/", (c) => this.store(c))
    router.put("/:id", (c) => this.update(c))
    router.patch("/:id", (c) => this.update(c))
    router.delete("/:id", (c) => this.delete(c))
    return router
  }
}
