import type { ResolverService, ResolverSession } from './types.js'
import { ResolutionError, toError } from '../http/errors.js'

export interface HttpResolverServiceOptions {
  baseUrl: string
  requestTimeoutMs?: number
  fetch?: typeof fetch
}

/**
 * Looks services up over HTTP: `GET {baseUrl}/{env}/services/{name}` answering
 * `{ "host": "https://..." }`.
 */
export class HttpResolverService implements ResolverService {
  private readonly baseUrl: string
  private readonly requestTimeoutMs: number
  private readonly fetchImpl: typeof fetch

  constructor(options: HttpResolverServiceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000
    this.fetchImpl = options.fetch ?? globalThis.fetch
  }

  async connect(env: string): Promise<ResolverSession> {
    const controller = new AbortController()

    return {
      getHost: async serviceName => this.lookup(env, serviceName, controller),
      close: async () => {
        controller.abort()
      },
    }
  }

  private async lookup(env: string, serviceName: string, session: AbortController): Promise<string> {
    const url = `${this.baseUrl}/${encodeURIComponent(env)}/services/${encodeURIComponent(serviceName)}`
    const details = { url, env, serviceName }
    const timeoutId = setTimeout(() => session.abort(), this.requestTimeoutMs)

    let res: Response
    try {
      res = await this.fetchImpl(url, {
        method: 'GET',
        headers: { accept: 'application/json' },
        signal: session.signal,
      })
    }
    catch (err: unknown) {
      const isAbort = err instanceof Error && err.name === 'AbortError'
      const cause = toError(err)
      throw new ResolutionError(
        isAbort
          ? `Lookup of ${serviceName} aborted/timeout after ${this.requestTimeoutMs}ms`
          : `Lookup of ${serviceName} network failure: ${cause.message}`,
        { details, cause },
      )
    }
    finally {
      clearTimeout(timeoutId)
    }

    if (res.status === 404) {
      throw new ResolutionError(`Service ${serviceName} is not registered in ${env}`, { details: { ...details, status: 404 } })
    }
    if (!res.ok) {
      const text = await res.text().catch(() => '')
      const cause = text.length > 0 ? new Error(text.slice(0, 200)) : undefined
      throw new ResolutionError(`Lookup of ${serviceName} failed (${res.status})`, { details: { ...details, status: res.status }, cause })
    }

    let body: unknown
    try {
      body = await res.json()
    }
    catch (err: unknown) {
      throw new ResolutionError(`Lookup of ${serviceName} returned malformed JSON`, { details, cause: err })
    }

    if (typeof body !== 'object' || body === null || !('host' in body) || typeof body.host !== 'string' || body.host === '') {
      throw new ResolutionError(`Lookup of ${serviceName} returned no host`, { details })
    }
    return body.host
  }
}
