/**
 * Error taxonomy shared by resource services, controllers and the RBAC engine.
 *
 * Every error carries a machine-readable code and the HTTP status the
 * controllers answer with, so handlers never need to inspect messages.
 *
 * @packageDocumentation
 */

export type ContractErrorCode =
  | "invalid_argument"
  | "validation_failed"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "conflict"
  | "contract_violation"
  | "transaction_failure"
  | "partial_failure"

export class ContractError extends Error {
  constructor(
    public readonly code: ContractErrorCode,
    message: string,
    public readonly status: number = 400,
  ) {
    super(message)
    this.name = "ContractError"
  }
}

export class InvalidArgumentError extends ContractError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super("invalid_argument", message, 400)
    this.name = "InvalidArgumentError"
  }
}

/**
 * Field-level validation failure for create/update payloads.
 * `errors` maps each offending field to its first message.
 */
export class ValidationError extends ContractError {
  constructor(public readonly errors: Record<string, string>) {
    super("validation_failed", "Validation failed", 422)
    this.name = "ValidationError"
  }
}

export class AuthorizationError extends ContractError {
  constructor(message: string, status: 401 | 403 = 403) {
    super(status === 401 ? "unauthorized" : "forbidden", message, status)
    this.name = "AuthorizationError"
  }
}

export class NotFoundError extends ContractError {
  constructor(message: string) {
    super("not_found", message, 404)
    this.name = "NotFoundError"
  }
}

export class ConflictError extends ContractError {
  constructor(message: string) {
    super("conflict", message, 409)
    this.name = "ConflictError"
  }
}

export class ContractViolationError extends ContractError {
  constructor(
    public readonly candidate: string,
    public readonly contract: string,
    public readonly missing: string[],
  ) {
    super(
      "contract_violation",
      `'${candidate}' does not implement ${contract}: missing ${missing.join(", ")}`,
      500,
    )
    this.name = "ContractViolationError"
  }
}

export class TransactionFailureError extends ContractError {
  constructor(
    message: string,
    public readonly failure?: unknown,
  ) {
    super("transaction_failure", message, 500)
    this.name = "TransactionFailureError"
  }
}

/**
 * A sequential multi-item operation stopped partway through.
 * Items before the failure stay committed.
 */
export class PartialFailureError extends ContractError {
  constructor(
    public readonly succeeded: number,
    public readonly attempted: number,
    public readonly failure: Error,
  ) {
    super(
      "partial_failure",
      `${succeeded} of ${attempted} succeeded: ${failure.message}`,
      failure instanceof ContractError ? failure.status : 500,
    )
    this.name = "PartialFailureError"
  }
}

/**
 * True for errors caused by the caller's input rather than by the system.
 */
export function isInvalidInput(error: unknown): boolean {
  return (
    error instanceof InvalidArgumentError ||
    error instanceof ValidationError ||
    error instanceof ConflictError
  )
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
