/**
 * Backoff policies and the retry driver
 */

import type { Logger } from '../logging/index.js'
import type { Attempt, RetrySignal } from './types.js'

export interface RetryState {
  /** 1-based number of the attempt that just failed */
  attempt: number
  /** Milliseconds since the first attempt started */
  elapsedMs: number
  /** Delay slept before the attempt that just failed, 0 for the first */
  lastDelayMs: number
}

export type WaitStrategy = (state: RetryState) => number
export type StopStrategy = (state: RetryState) => boolean

export interface BackoffPolicy {
  wait: WaitStrategy
  stop: StopStrategy
}

/**
 * Base multiplier for exponential backoff calculation
 */
const RETRY_BACKOFF_BASE = 2

export interface ExponentialWaitOptions {
  initialDelayMs?: number
  multiplier?: number
  maxDelayMs?: number
  /** Fraction of the delay applied as symmetric random jitter */
  jitterFactor?: number
}

/**
 * delay = initialDelayMs * multiplier^(attempt - 1), capped, with optional jitter
 */
export function waitExponential(options: ExponentialWaitOptions = {}): WaitStrategy {
  const {
    initialDelayMs = 1000,
    multiplier = RETRY_BACKOFF_BASE,
    maxDelayMs = 60_000,
    jitterFactor = 0,
  } = options

  return ({ attempt }) => {
    const exponentialDelay = initialDelayMs * multiplier ** (attempt - 1)
    const cappedDelay = Math.min(exponentialDelay, maxDelayMs)
    const jitter = cappedDelay * jitterFactor * (Math.random() - 0.5)
    return Math.max(0, cappedDelay + jitter)
  }
}

/**
 * Full jitter: a random delay between 0 and the exponential ceiling
 */
export function waitRandomExponential(options: Omit<ExponentialWaitOptions, 'jitterFactor'> = {}): WaitStrategy {
  const ceiling = waitExponential(options)
  return state => Math.random() * ceiling(state)
}

export function waitFixed(delayMs: number): WaitStrategy {
  return () => delayMs
}

/**
 * Stops once the time since the first attempt reaches the budget
 */
export function stopAfterDelay(budgetMs: number): StopStrategy {
  return ({ elapsedMs }) => elapsedMs >= budgetMs
}

export function stopAfterAttempt(maxAttempts: number): StopStrategy {
  return ({ attempt }) => attempt >= maxAttempts
}

export function stopAny(...strategies: StopStrategy[]): StopStrategy {
  return state => strategies.some(stop => stop(state))
}

export const stopNever: StopStrategy = () => false

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  wait: waitExponential(),
  stop: stopAfterDelay(30_000),
}

/**
 * Sleeps for the specified number of milliseconds
 */
export async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export interface RetryOptions<T> {
  logger?: Logger
  /** Short label for log records, e.g. `GET /users` */
  label?: string
  /** Releases a response that is dropped in favour of another attempt */
  discard?: (value: T) => Promise<void>
  sleep?: (ms: number) => Promise<void>
}

function describeSignal<T>(signal: RetrySignal<T>): string {
  return signal.kind === 'error' ? `${signal.error.name}: ${signal.error.message}` : 'retriable response'
}

/**
 * Unwraps the carried value of an exhausted retry: a response is returned,
 * an error is thrown.
 */
export function unwrapSignal<T>(signal: RetrySignal<T>): T {
  if (signal.kind === 'error') {
    throw signal.error
  }
  return signal.response
}

/**
 * Runs `attempt` until it succeeds, throws, or the policy says stop. The
 * caller sees the last attempt's verdict, never a wrapper.
 */
export async function withRetry<T>(
  attempt: (attemptNumber: number) => Promise<Attempt<T>>,
  policy: BackoffPolicy = DEFAULT_BACKOFF_POLICY,
  options: RetryOptions<T> = {},
): Promise<T> {
  const { logger, label = 'operation', discard, sleep: pause = sleep } = options
  const startedAt = Date.now()
  let lastDelayMs = 0

  for (let attemptNumber = 1; ; attemptNumber++) {
    const result = await attempt(attemptNumber)
    if (result.ok) {
      return result.value
    }

    const state: RetryState = {
      attempt: attemptNumber,
      elapsedMs: Date.now() - startedAt,
      lastDelayMs,
    }

    if (policy.stop(state)) {
      logger?.warn(`Giving up on ${label} after ${attemptNumber} attempt(s)`, {
        elapsedMs: state.elapsedMs,
        reason: describeSignal(result.signal),
      })
      return unwrapSignal(result.signal)
    }

    if (result.signal.kind === 'response' && discard) {
      await discard(result.signal.response)
    }

    const delay = policy.wait(state)
    logger?.info(`Retrying ${label} (attempt ${attemptNumber + 1}) after ${Math.round(delay)}ms`, {
      reason: describeSignal(result.signal),
    })
    await pause(delay)
    lastDelayMs = delay
  }
}
