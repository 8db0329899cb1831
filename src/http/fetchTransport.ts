/**
 * Transport over Node 20 fetch with per-attempt timeout
 */

import type { HttpMethod, Transport, TransportRequestOptions, TransportResponse } from './types.js'
import { ClientClosedError, TimeoutError, TransportError, toError } from './errors.js'

/**
 * One request in flight, from sending until its body is buffered or released.
 * The timer and abort signal cover the whole exchange.
 */
interface Exchange {
  readonly signal: AbortSignal
  /** Maps an abort or read failure to the transport's error */
  failure: (error: unknown) => Error
  /** Clears the timer and forgets the exchange; idempotent */
  finish: () => void
}

async function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason)
      return
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true })
  })
}

/**
 * Wraps a fetch Response so the body is read at most once and can be
 * inspected by the dispatcher before the caller reads it again.
 */
export class FetchResponse implements TransportResponse {
  private readonly response: Response
  private readonly exchange?: Exchange
  private bodyText?: Promise<string>
  private released = false

  constructor(response: Response, exchange?: Exchange) {
    this.response = response
    this.exchange = exchange
  }

  get status(): number {
    return this.response.status
  }

  get statusText(): string {
    return this.response.statusText
  }

  get headers(): Headers {
    return this.response.headers
  }

  get url(): string {
    return this.response.url
  }

  async text(): Promise<string> {
    this.bodyText ??= this.readBody()
    return this.bodyText
  }

  async json<T = unknown>(): Promise<T> {
    const text = await this.text()
    return JSON.parse(text) as T
  }

  /**
   * Drops an unread body so the connection goes back to the pool
   */
  async release(): Promise<void> {
    if (this.released) {
      return
    }
    this.released = true
    if (this.bodyText !== undefined) {
      // a pending read finishes the exchange itself
      return
    }
    try {
      if (this.response.body !== null && !this.response.bodyUsed) {
        await this.response.body.cancel()
      }
    }
    finally {
      this.exchange?.finish()
    }
  }

  private async readBody(): Promise<string> {
    const exchange = this.exchange
    if (!exchange) {
      return this.response.text()
    }
    try {
      return await Promise.race([this.response.text(), whenAborted(exchange.signal)])
    }
    catch (error) {
      throw exchange.failure(error)
    }
    finally {
      exchange.finish()
    }
  }
}

function serializeBody(body: string | object | undefined): string | undefined {
  if (body === undefined) {
    return undefined
  }
  return typeof body === 'string' ? body : JSON.stringify(body)
}

export interface FetchTransportOptions {
  /** Headers sent with every request, overridden per request */
  defaultHeaders?: Record<string, string>
  fetch?: typeof fetch
}

export class FetchTransport implements Transport {
  private readonly defaultHeaders: Record<string, string>
  private readonly fetchImpl: typeof fetch
  private readonly inFlight = new Set<AbortController>()
  private closed = false

  constructor(options: FetchTransportOptions = {}) {
    this.defaultHeaders = {
      'User-Agent': 'service-client/0.1.0',
      ...options.defaultHeaders,
    }
    this.fetchImpl = options.fetch ?? globalThis.fetch
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Number of exchanges whose body is neither buffered nor released
   */
  get pending(): number {
    return this.inFlight.size
  }

  async request(method: HttpMethod, url: string, options: TransportRequestOptions): Promise<TransportResponse> {
    if (this.closed) {
      throw new ClientClosedError('Transport is closed')
    }

    const body = serializeBody(options.body)
    const headers: Record<string, string> = {
      ...this.defaultHeaders,
      ...(body !== undefined && typeof options.body === 'object' ? { 'Content-Type': 'application/json' } : {}),
      ...options.headers,
    }

    const exchange = this.startExchange(method, url, options.timeoutMs)

    let response: Response
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body,
        signal: exchange.signal,
      })
    }
    catch (error) {
      exchange.finish()
      throw exchange.failure(error)
    }
    return new FetchResponse(response, exchange)
  }

  /**
   * Aborts in-flight requests, body reads included, and refuses new ones
   */
  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    for (const controller of this.inFlight) {
      controller.abort()
    }
    this.inFlight.clear()
  }

  private startExchange(method: HttpMethod, url: string, timeoutMs: number): Exchange {
    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    this.inFlight.add(controller)

    return {
      signal: controller.signal,
      failure: (error) => {
        if (timedOut) {
          return new TimeoutError(`${method} ${url} timed out after ${timeoutMs}ms`, {
            details: { url },
            cause: error,
          })
        }
        if (this.closed) {
          return new ClientClosedError(`${method} ${url} aborted: transport closed`)
        }
        const cause = toError(error)
        return new TransportError(`${method} ${url} failed: ${cause.message}`, { details: { url }, cause })
      },
      finish: () => {
        clearTimeout(timeoutId)
        this.inFlight.delete(controller)
      },
    }
  }
}
