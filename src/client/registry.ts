import type { DomainErrorClass } from '../http/errors.js'
import type { ErrorPayload } from '../http/types.js'
import { ConfigurationError, DomainError } from '../http/errors.js'

/**
 * Type guard for the `{ status: "error", cls: "<tag>" }` wire payload
 */
export function isErrorPayload(value: unknown): value is ErrorPayload {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && 'status' in value
    && value.status === 'error'
    && 'cls' in value
    && typeof value.cls === 'string'
    && value.cls !== ''
}

/**
 * Maps error-payload tags to the domain error classes raised for them
 */
export class ExceptionRegistry {
  private readonly entries = new Map<string, DomainErrorClass>()

  constructor(initial: Record<string, DomainErrorClass> = {}) {
    for (const [tag, errorClass] of Object.entries(initial)) {
      this.register(tag, errorClass)
    }
  }

  register(tag: string, errorClass: DomainErrorClass = DomainError): this {
    if (tag.trim() === '') {
      throw new ConfigurationError('Error tag cannot be empty', { details: { field: 'exceptions' } })
    }
    const proto: unknown = typeof errorClass === 'function' ? errorClass.prototype : undefined
    if (!(errorClass === DomainError || proto instanceof DomainError)) {
      throw new ConfigurationError(`Error class for ${tag} must extend DomainError`, { details: { field: 'exceptions', tag } })
    }
    this.entries.set(tag, errorClass)
    return this
  }

  unregister(tag: string): boolean {
    return this.entries.delete(tag)
  }

  has(tag: string): boolean {
    return this.entries.has(tag)
  }

  get tags(): string[] {
    return [...this.entries.keys()]
  }

  /**
   * Builds the mapped error for a payload, or undefined when the payload is
   * not an error payload or its tag is unregistered
   */
  toError(payload: unknown, status: number): DomainError | undefined {
    if (!isErrorPayload(payload)) {
      return undefined
    }
    const errorClass = this.entries.get(payload.cls)
    if (!errorClass) {
      return undefined
    }
    return new errorClass(payload.cls, status, payload)
  }
}
