/**
 * Contract registry
 *
 * Holds named service or controller implementations and checks, at
 * registration time, that each one exposes every operation its contract
 * requires. One registry is built per contract at startup and handed to
 * whatever needs to resolve implementations by name.
 *
 * @packageDocumentation
 */

import { ContractViolationError, NotFoundError } from "./errors.js"

/**
 * Names of the function-valued members of T
 */
export type OperationName<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? K : never
}[keyof T] &
  string

export interface ContractDefinition<T> {
  /** Contract name used in violation messages */
  name: string
  /** "service" or "controller"; used in lookup errors */
  kind: string
  operations: readonly OperationName<T>[]
}

export interface ContractCheck {
  valid: boolean
  errors: string[]
  missing: string[]
}

export type RegistrationResult =
  | { ok: true }
  | { ok: false; error: ContractViolationError }

/**
 * Operations the candidate lacks, in contract order
 */
export function findMissingOperations(
  candidate: object,
  operations: readonly string[],
): string[] {
  return operations.filter((op) => typeof Reflect.get(candidate, op) !== "function")
}

/**
 * ContractRegistry - name-keyed store of conforming implementations
 *
 * TESTING CHECKLIST:
 * - register rejects a candidate missing operations and names all of them
 * - register overwrites an existing entry under the same name
 * - mustRegister throws on violation
 * - get throws NotFoundError for unknown names
 * - validateAll reports every entry, including ones stored unchecked
 */
export class ContractRegistry<T extends object> {
  private entries = new Map<string, object>()
  private validationEnabled = true

  constructor(private readonly definition: ContractDefinition<T>) {}

  get contractName(): string {
    return this.definition.name
  }

  /**
   * Structurally check a candidate against the contract
   */
  check(candidate: object): ContractCheck {
    const missing = findMissingOperations(candidate, this.definition.operations)
    return {
      valid: missing.length === 0,
      errors: missing.map((op) => `missing required operation: ${op}`),
      missing,
    }
  }

  conforms(candidate: object): candidate is T {
    return this.check(candidate).valid
  }

  /**
   * Store a candidate under `name` if it satisfies the contract.
   * Re-registering a name replaces the previous entry.
   */
  register(name: string, candidate: object): RegistrationResult {
    if (this.validationEnabled) {
      const result = this.check(candidate)
      if (!result.valid) {
        return {
          ok: false,
          error: new ContractViolationError(
            name,
            this.definition.name,
            result.missing,
          ),
        }
      }
    }
    this.entries.set(name, candidate)
    return { ok: true }
  }

  /**
   * Like {@link register}, but throws. Meant for startup wiring where a
   * missing operation is a programming error.
   */
  mustRegister(name: string, candidate: object): void {
    const result = this.register(name, candidate)
    if (!result.ok) {
      throw result.error
    }
  }

  get(name: string): T {
    const entry = this.entries.get(name)
    if (!entry) {
      throw new NotFoundError(`${this.definition.kind} '${name}' not found`)
    }
    // Entries stored while validation was disabled are checked on the way out
    if (!this.conforms(entry)) {
      throw new ContractViolationError(
        name,
        this.definition.name,
        this.check(entry).missing,
      )
    }
    return entry
  }

  has(name: string): boolean {
    return this.entries.has(name)
  }

  list(): string[] {
    return [...this.entries.keys()].sort()
  }

  validateAll(): Record<string, ContractCheck> {
    const report: Record<string, ContractCheck> = {}
    for (const name of this.list()) {
      const entry = this.entries.get(name)
      if (entry) report[name] = this.check(entry)
    }
    return report
  }

  enableValidation(enabled: boolean): void {
    this.validationEnabled = enabled
  }
}
