/**
 * Issues one logical request: resolve host, attempt with retry, classify,
 * map domain errors
 */

import type { ClientConfig } from '../client/config.js'
import type { ExceptionRegistry } from '../client/registry.js'
import type { Logger } from '../logging/index.js'
import type { HostResolver } from '../resolver/hostResolver.js'
import type { Attempt, HttpMethod, HttpRequestOptions, Transport, TransportResponse } from './types.js'
import { createLogger } from '../logging/index.js'
import { ErrorClassifier, isSuccessStatus } from './classifier.js'
import { RetriableStatusError } from './errors.js'
import { withRetry } from './retry.js'

export interface RequestDispatcherOptions {
  hostResolver: HostResolver
  transport: Transport
  config: ClientConfig
  exceptions: ExceptionRegistry
  prefix?: string
  logger?: Logger
  sleep?: (ms: number) => Promise<void>
}

function appendQuery(url: string, query: HttpRequestOptions['query']): string {
  if (!query || Object.keys(query).length === 0) {
    return url
  }
  const searchParams = new URLSearchParams()
  for (const [key, value] of Object.entries(query)) {
    searchParams.set(key, String(value))
  }
  return `${url}${url.includes('?') ? '&' : '?'}${searchParams.toString()}`
}

export class RequestDispatcher {
  private readonly hostResolver: HostResolver
  private readonly transport: Transport
  private readonly config: ClientConfig
  private readonly classifier: ErrorClassifier
  private readonly exceptions: ExceptionRegistry
  private readonly prefix: string
  private readonly logger: Logger
  private readonly sleep?: (ms: number) => Promise<void>

  constructor(options: RequestDispatcherOptions) {
    this.hostResolver = options.hostResolver
    this.transport = options.transport
    this.config = options.config
    this.classifier = new ErrorClassifier(options.config)
    this.exceptions = options.exceptions
    this.prefix = options.prefix ?? ''
    this.logger = options.logger ?? createLogger('RequestDispatcher')
    this.sleep = options.sleep
  }

  /**
   * Host plus prefix, no slash normalization
   */
  async getBaseUrl(): Promise<string> {
    const host = await this.hostResolver.getHost()
    return `${host}${this.prefix}`
  }

  /**
   * Sends one logical request. The host is resolved inside every attempt, but
   * a `ResolutionError` is only retried when listed in `retryableErrorKinds`.
   */
  async issue(method: HttpMethod, path: string, options: HttpRequestOptions = {}): Promise<TransportResponse> {
    const { query, timeoutMs = this.config.timeoutMs, ...requestOptions } = options
    let lastUrl = path

    const attempt = async (attemptNumber: number): Promise<Attempt<TransportResponse>> => {
      let response: TransportResponse
      try {
        const url = appendQuery(`${await this.getBaseUrl()}${path}`, query)
        lastUrl = url
        this.logger.info(`HTTP ${method} ${url}`, {
          attempt: attemptNumber,
          timestamp: new Date().toISOString(),
        })
        response = await this.transport.request(method, url, { ...requestOptions, timeoutMs })
      }
      catch (error) {
        return this.classifier.classifyError<TransportResponse>(error)
      }

      this.logger.debug(`HTTP ${method} ${lastUrl} → ${response.status} ${response.statusText}`)
      const verdict = this.classifier.classifyResponse(response)
      if (!verdict.ok) {
        return verdict
      }

      if (!isSuccessStatus(response.status)) {
        let body: string
        try {
          body = await response.text()
        }
        catch (error) {
          await response.release()
          return this.classifier.classifyError<TransportResponse>(error)
        }
        await this.raiseMappedError(response, body)
      }
      return verdict
    }

    const response = await withRetry(attempt, this.config.backoff, {
      logger: this.logger,
      label: `${method} ${path}`,
      discard: async res => res.release(),
      sleep: this.sleep,
    })

    if (this.config.throwOnExhaustedStatus && this.classifier.isRetriableStatus(response.status)) {
      // Buffer the body so it stays readable on the error after release
      await response.text().catch(() => '')
      await response.release()
      throw new RetriableStatusError(response.status, response, lastUrl)
    }
    return response
  }

  /**
   * Throws the registered domain error for a structured error payload.
   * Bodies that are not JSON, or carry an unregistered tag, fall through and
   * the raw response goes back to the caller.
   */
  private async raiseMappedError(response: TransportResponse, body: string): Promise<void> {
    let payload: unknown
    try {
      payload = JSON.parse(body)
    }
    catch (error) {
      this.logger.debug('Non-2xx body is not JSON, returning raw response', {
        status: response.status,
        error,
      })
      return
    }

    const mapped = this.exceptions.toError(payload, response.status)
    if (mapped) {
      await response.release()
      throw mapped
    }
  }
}
