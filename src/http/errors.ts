/**
 * Error taxonomy shared by the dispatcher, the resolver and the client
 */

export type ClientErrorCode
  = 'CONFIGURATION'
    | 'RESOLUTION'
    | 'TRANSPORT'
    | 'TIMEOUT'
    | 'RETRIABLE_STATUS'
    | 'DOMAIN'
    | 'CLIENT_CLOSED'

export interface ErrorDetails {
  status?: number
  url?: string
  serviceName?: string
  env?: string
  field?: string
  tag?: string
  [key: string]: unknown
}

export interface ClientErrorOptions {
  details?: ErrorDetails
  cause?: unknown
}

export class ClientError extends Error {
  readonly code: ClientErrorCode
  readonly details?: ErrorDetails
  readonly cause?: unknown

  constructor(code: ClientErrorCode, message: string, options?: ClientErrorOptions) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.details = options?.details
    this.cause = options?.cause
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Bad or ambiguous construction arguments. Never retried.
 */
export class ConfigurationError extends ClientError {
  constructor(message: string, options?: ClientErrorOptions) {
    super('CONFIGURATION', message, options)
  }
}

/**
 * Naming backend unreachable or service name unknown
 */
export class ResolutionError extends ClientError {
  constructor(message: string, options?: ClientErrorOptions) {
    super('RESOLUTION', message, options)
  }
}

/**
 * Connection-level failure. Retriable by default.
 */
export class TransportError extends ClientError {
  constructor(message: string, options?: ClientErrorOptions, code: 'TRANSPORT' | 'TIMEOUT' = 'TRANSPORT') {
    super(code, message, options)
  }
}

export class TimeoutError extends TransportError {
  constructor(message: string, options?: ClientErrorOptions) {
    super(message, options, 'TIMEOUT')
  }
}

export class ClientClosedError extends ClientError {
  constructor(message = 'Client is closed') {
    super('CLIENT_CLOSED', message)
  }
}

/**
 * Thrown instead of returning the last response when retries on a status
 * pattern ran out and `throwOnExhaustedStatus` is set.
 */
export class RetriableStatusError<R = unknown> extends ClientError {
  readonly response: R

  constructor(status: number, response: R, url?: string) {
    super('RETRIABLE_STATUS', `Retriable status ${status} persisted after retries`, { details: { status, url } })
    this.response = response
  }
}

/**
 * Application-level error rebuilt from a `{ status: "error", cls }` payload.
 * Subclass it and register the subclass under its tag.
 */
export class DomainError extends ClientError {
  readonly tag: string
  readonly status: number
  readonly payload: Record<string, unknown>

  constructor(tag: string, status: number, payload: Record<string, unknown>) {
    const message = typeof payload.message === 'string' && payload.message !== ''
      ? payload.message
      : `Service reported ${tag}`
    super('DOMAIN', message, { details: { status, tag } })
    this.tag = tag
    this.status = status
    this.payload = payload
  }
}

export type DomainErrorClass = new (tag: string, status: number, payload: Record<string, unknown>) => DomainError

/**
 * Any error constructor; matched with `instanceof`
 */
export type ErrorKind = abstract new (...args: never[]) => Error

/**
 * Checks if an error is a ClientError with a specific code
 */
export function isClientErrorOfCode(error: unknown, code: ClientErrorCode): error is ClientError {
  return error instanceof ClientError && error.code === code
}

/**
 * Coerces thrown non-Error values so they can be carried and rethrown
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
