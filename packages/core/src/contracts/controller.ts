/**
 * Capability contracts for HTTP-facing resource controllers.
 *
 * @packageDocumentation
 */

import type { Context } from "hono"
import type { ContractDefinition } from "./registry.js"
import type { RecordInput } from "./service.js"
import type {
  ControllerMetadata,
  ListRequest,
  PaginatedResult,
} from "./types.js"

/**
 * Hono environment for resource routes.
 * `userId` is set by whatever authentication middleware runs upstream.
 */
export interface ResourceEnv {
  Variables: {
    userId: number | undefined
  }
}

export type ResourceContext = Context<ResourceEnv>

export interface ResourceActionsContract {
  index(c: ResourceContext): Promise<Response>
  show(c: ResourceContext): Promise<Response>
  store(c: ResourceContext): Promise<Response>
  update(c: ResourceContext): Promise<Response>
  delete(c: ResourceContext): Promise<Response>
}

export interface PaginationControllerContract {
  validatePaginationRequest(c: ResourceContext): ListRequest
  getPaginationDefaults(): ListRequest
  buildPaginatedResponse<T>(
    c: ResourceContext,
    result: PaginatedResult<T>,
    request: ListRequest,
  ): Response
}

export interface ValidationControllerContract {
  validateCreateRequest(c: ResourceContext): Promise<RecordInput>
  validateUpdateRequest(c: ResourceContext): Promise<RecordInput>
  validateId(c: ResourceContext, param?: string): number
  getValidationRules(): Record<string, string>
}

export interface ResponseControllerContract {
  successResponse(c: ResourceContext, data?: unknown, message?: string): Response
  createdResponse(c: ResourceContext, data: unknown, message?: string): Response
  noContentResponse(c: ResourceContext): Response
  badRequestResponse(
    c: ResourceContext,
    message: string,
    errors?: Record<string, string>,
  ): Response
  notFoundResponse(c: ResourceContext, message: string): Response
  forbiddenResponse(c: ResourceContext, message: string): Response
  validationErrorResponse(
    c: ResourceContext,
    errors: Record<string, string>,
  ): Response
  internalErrorResponse(c: ResourceContext, message?: string): Response
  resourceNotFoundResponse(c: ResourceContext, id: number): Response
  resourceCreatedResponse(c: ResourceContext, data: unknown): Response
  resourceUpdatedResponse(c: ResourceContext, data: unknown): Response
  resourceDeletedResponse(c: ResourceContext, id: number): Response
}

export interface AuthorizationControllerContract {
  checkPermission(c: ResourceContext, permission: string): Promise<boolean>
  getCurrentUser(c: ResourceContext): number | undefined
  requireAuthentication(c: ResourceContext): number
  buildPermissionsMap(c: ResourceContext): Promise<Record<string, boolean>>
}

export interface ResourceControllerContract
  extends ResourceActionsContract,
    PaginationControllerContract,
    ValidationControllerContract,
    ResponseControllerContract,
    AuthorizationControllerContract {
  generateMetadata(): ControllerMetadata
}

export const RESOURCE_CONTROLLER: ContractDefinition<ResourceControllerContract> =
  {
    name: "ResourceControllerContract",
    kind: "controller",
    operations: [
      "index",
      "show",
      "store",
      "update",
      "delete",
      "validatePaginationRequest",
      "getPaginationDefaults",
      "buildPaginatedResponse",
      "validateCreateRequest",
      "validateUpdateRequest",
      "validateId",
      "getValidationRules",
      "successResponse",
      "createdResponse",
      "noContentResponse",
      "badRequestResponse",
      "notFoundResponse",
      "forbiddenResponse",
      "validationErrorResponse",
      "internalErrorResponse",
      "resourceNotFoundResponse",
      "resourceCreatedResponse",
      "resourceUpdatedResponse",
      "resourceDeletedResponse",
      "checkPermission",
      "getCurrentUser",
      "requireAuthentication",
      "buildPermissionsMap",
    ],
  }
