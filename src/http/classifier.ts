/**
 * Decides whether an attempt's outcome should be retried
 */

import type { ErrorKind } from './errors.js'
import type { Attempt } from './types.js'

export interface ClassificationRules {
  retryStatusPatterns: ReadonlySet<string>
  retryableErrorKinds: readonly ErrorKind[]
}

/**
 * Patterns a status matches, most specific first: 503 → 503, 50x, 5xx
 */
export function statusPatterns(status: number): [string, string, string] {
  const code = String(status)
  return [code, `${code.slice(0, 2)}x`, `${code.slice(0, 1)}xx`]
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300
}

export class ErrorClassifier {
  private readonly rules: ClassificationRules

  constructor(rules: ClassificationRules) {
    this.rules = rules
  }

  isRetriableStatus(status: number): boolean {
    return statusPatterns(status).some(pattern => this.rules.retryStatusPatterns.has(pattern))
  }

  isRetriableError(error: unknown): boolean {
    return this.rules.retryableErrorKinds.some(kind => error instanceof kind)
  }

  /**
   * Classifies a response by status. Does not retry by itself.
   */
  classifyResponse<R extends { status: number }>(response: R): Attempt<R> {
    if (this.isRetriableStatus(response.status)) {
      return { ok: false, signal: { kind: 'response', response } }
    }
    return { ok: true, value: response }
  }

  /**
   * Classifies a thrown error; rethrows it unchanged when it is not retriable
   */
  classifyError<R>(error: unknown): Attempt<R> {
    if (error instanceof Error && this.isRetriableError(error)) {
      return { ok: false, signal: { kind: 'error', error } }
    }
    throw error
  }
}
