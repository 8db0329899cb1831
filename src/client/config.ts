/**
 * Client configuration: normalization, validation and merging
 */

import type { ClassificationRules } from '../http/classifier.js'
import type { ErrorKind } from '../http/errors.js'
import type { BackoffPolicy, StopStrategy, WaitStrategy } from '../http/retry.js'
import { ConfigurationError, TransportError } from '../http/errors.js'
import { DEFAULT_BACKOFF_POLICY } from '../http/retry.js'

export const DEFAULT_RETRY_STATUS_PATTERNS: readonly string[] = ['5xx']
export const DEFAULT_TIMEOUT_MS = 30_000

export interface ClientConfigOptions {
  retryStatusPatterns?: Iterable<string | number>
  retryableErrorKinds?: Iterable<ErrorKind>
  retryOnConnectionError?: boolean
  backoff?: Partial<BackoffPolicy>
  timeoutMs?: number
  /** Throw RetriableStatusError instead of returning the last response */
  throwOnExhaustedStatus?: boolean
}

export type ClientConfigInput = ClientConfigOptions | ClientConfig | undefined

const KNOWN_KEYS = new Set<string>([
  'retryStatusPatterns',
  'retryableErrorKinds',
  'retryOnConnectionError',
  'backoff',
  'timeoutMs',
  'throwOnExhaustedStatus',
])

const STATUS_PATTERN = /^(?:\d{3}|\d{2}x|\dxx)$/

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value
}

function normalizeStatusPatterns(value: unknown): Set<string> {
  if (!isIterable(value) || typeof value === 'string') {
    throw new ConfigurationError('retryStatusPatterns must be an iterable of status codes or patterns', {
      details: { field: 'retryStatusPatterns' },
    })
  }

  const patterns = new Set<string>()
  for (const item of value) {
    if (typeof item !== 'string' && typeof item !== 'number') {
      throw new ConfigurationError(`retryStatusPatterns contains a non string/number entry: ${String(item)}`, {
        details: { field: 'retryStatusPatterns' },
      })
    }
    const pattern = String(item).trim().toLowerCase()
    if (!STATUS_PATTERN.test(pattern)) {
      throw new ConfigurationError(`Unrecognized status pattern ${JSON.stringify(pattern)}, expected e.g. "503", "50x" or "5xx"`, {
        details: { field: 'retryStatusPatterns' },
      })
    }
    patterns.add(pattern)
  }
  return patterns
}

function isErrorKind(value: unknown): value is ErrorKind {
  if (typeof value !== 'function') {
    return false
  }
  const proto: unknown = value.prototype
  return value === Error || proto instanceof Error
}

function isStrategy(value: unknown): value is WaitStrategy & StopStrategy {
  return typeof value === 'function'
}

function normalizeErrorKinds(value: unknown): ErrorKind[] {
  if (!isIterable(value) || typeof value === 'string') {
    throw new ConfigurationError('retryableErrorKinds must be an iterable of error classes', {
      details: { field: 'retryableErrorKinds' },
    })
  }
  const kinds: ErrorKind[] = []
  for (const item of value) {
    if (!isErrorKind(item)) {
      throw new ConfigurationError('retryableErrorKinds must only contain Error subclasses', {
        details: { field: 'retryableErrorKinds' },
      })
    }
    if (!kinds.includes(item)) {
      kinds.push(item)
    }
  }
  return kinds
}

function normalizeBackoff(value: unknown): BackoffPolicy {
  if (!isPlainObject(value)) {
    throw new ConfigurationError('backoff must be an object with optional wait and stop strategies', {
      details: { field: 'backoff' },
    })
  }
  for (const key of Object.keys(value)) {
    if (key !== 'wait' && key !== 'stop') {
      throw new ConfigurationError(`Unknown backoff option ${JSON.stringify(key)}`, { details: { field: 'backoff' } })
    }
  }
  const { wait = DEFAULT_BACKOFF_POLICY.wait, stop = DEFAULT_BACKOFF_POLICY.stop } = value
  if (!isStrategy(wait) || !isStrategy(stop)) {
    throw new ConfigurationError('backoff.wait and backoff.stop must be functions', { details: { field: 'backoff' } })
  }
  return { wait, stop }
}

function normalizeTimeout(value: unknown): number {
  if (typeof value !== 'number' || value < 0 || !Number.isFinite(value)) {
    throw new ConfigurationError('timeoutMs must be a non-negative finite number', { details: { field: 'timeoutMs' } })
  }
  return value
}

function normalizeFlag(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${field} must be a boolean`, { details: { field } })
  }
  return value
}

/**
 * Immutable, validated client configuration. Built once per client.
 */
export class ClientConfig implements ClassificationRules {
  readonly retryStatusPatterns: ReadonlySet<string>
  readonly retryableErrorKinds: readonly ErrorKind[]
  readonly retryOnConnectionError: boolean
  readonly backoff: BackoffPolicy
  readonly timeoutMs: number
  readonly throwOnExhaustedStatus: boolean

  private readonly options: Readonly<ClientConfigOptions>

  private constructor(options: Record<string, unknown>) {
    for (const key of Object.keys(options)) {
      if (!KNOWN_KEYS.has(key)) {
        throw new ConfigurationError(`Unknown config option ${JSON.stringify(key)}`, { details: { field: key } })
      }
    }

    const {
      retryStatusPatterns = DEFAULT_RETRY_STATUS_PATTERNS,
      retryableErrorKinds = [],
      retryOnConnectionError = true,
      backoff = {},
      timeoutMs = DEFAULT_TIMEOUT_MS,
      throwOnExhaustedStatus = false,
    } = options

    const patterns = normalizeStatusPatterns(retryStatusPatterns)
    const kinds = normalizeErrorKinds(retryableErrorKinds)
    const onConnectionError = normalizeFlag(retryOnConnectionError, 'retryOnConnectionError')
    const userKinds = [...kinds]
    if (onConnectionError && !kinds.includes(TransportError)) {
      kinds.push(TransportError)
    }

    this.retryStatusPatterns = patterns
    this.retryableErrorKinds = Object.freeze(kinds)
    this.retryOnConnectionError = onConnectionError
    this.backoff = Object.freeze(normalizeBackoff(backoff))
    this.timeoutMs = normalizeTimeout(timeoutMs)
    this.throwOnExhaustedStatus = normalizeFlag(throwOnExhaustedStatus, 'throwOnExhaustedStatus')
    this.options = Object.freeze({
      retryStatusPatterns: [...patterns],
      retryableErrorKinds: userKinds,
      retryOnConnectionError: onConnectionError,
      backoff: this.backoff,
      timeoutMs: this.timeoutMs,
      throwOnExhaustedStatus: this.throwOnExhaustedStatus,
    })
    Object.freeze(this)
  }

  /**
   * Builds a config from a plain options object, or returns an already built
   * one. Anything else is a ConfigurationError.
   */
  static from(input: unknown): ClientConfig {
    if (input instanceof ClientConfig) {
      return input
    }
    if (input === undefined || input === null) {
      return new ClientConfig({})
    }
    if (!isPlainObject(input)) {
      const shape = Array.isArray(input) ? 'array' : typeof input
      throw new ConfigurationError(`config of type ${shape} could not be recognized, use a plain object or a ClientConfig`)
    }
    return new ClientConfig(input)
  }

  /**
   * The explicit options this config was built from, with the implicit
   * connection-error kind left out
   */
  toOptions(): ClientConfigOptions {
    return { ...this.options }
  }
}

function toOptions(input: unknown): ClientConfigOptions {
  return ClientConfig.from(input).toOptions()
}

/**
 * Field-wise merge; values from `override` win. Both sides are validated.
 */
export function mergeClientConfig(base: unknown, override: unknown): ClientConfig {
  if (override === undefined || override === null) {
    return ClientConfig.from(base)
  }
  if (base === undefined || base === null) {
    return ClientConfig.from(override)
  }

  const baseOptions = toOptions(base)
  const overrideOptions = override instanceof ClientConfig ? override.toOptions() : override
  if (!isPlainObject(overrideOptions)) {
    return ClientConfig.from(override)
  }
  // Validates the override on its own so its errors name its own fields
  toOptions(overrideOptions)

  const merged: Record<string, unknown> = { ...baseOptions }
  for (const [key, value] of Object.entries(overrideOptions)) {
    if (value !== undefined) {
      merged[key] = key === 'backoff' && isPlainObject(value)
        ? { ...baseOptions.backoff, ...value }
        : value
    }
  }
  return ClientConfig.from(merged)
}
