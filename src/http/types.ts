/**
 * HTTP dispatch types and collaborator interfaces
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS'

export interface HttpRequestOptions {
  headers?: Record<string, string>
  body?: string | object
  query?: Record<string, string | number | boolean>
  /**
   * Overrides the client timeout for every attempt of this request.
   */
  timeoutMs?: number
}

export interface TransportRequestOptions {
  headers?: Record<string, string>
  body?: string | object
  timeoutMs: number
}

/**
 * A response handed out by a transport. It must be released once the caller
 * is done with it, whether or not the body was read.
 *
 * `text()` and `json()` must be callable more than once: the dispatcher reads
 * a non-2xx body to look for an error payload and then hands the same
 * response to the caller. Implementations buffer the body on first read.
 */
export interface TransportResponse {
  readonly status: number
  readonly statusText: string
  readonly headers: Headers
  readonly url: string
  text: () => Promise<string>
  json: <T = unknown>() => Promise<T>
  release: () => Promise<void>
}

/**
 * Opaque HTTP capability. Shared by every request of one client and closed
 * exactly once, by the client.
 */
export interface Transport {
  request: (method: HttpMethod, url: string, options: TransportRequestOptions) => Promise<TransportResponse>
  close: () => Promise<void>
}

/**
 * The value an attempt wants surfaced if no retry is left
 */
export type RetrySignal<T>
  = { kind: 'response', response: T }
    | { kind: 'error', error: Error }

export type Attempt<T>
  = { ok: true, value: T }
    | { ok: false, signal: RetrySignal<T> }

export interface ErrorPayload {
  status: 'error'
  cls: string
  [key: string]: unknown
}
