import type { Logger } from '../logging/index.js'
import type { HostState, ResolverService } from './types.js'
import { ResolutionError, toError } from '../http/errors.js'
import { createLogger } from '../logging/index.js'

type DynamicHostState = Extract<HostState, { mode: 'dynamic' }>

export const HOST_CACHE_TTL_MS = 60 * 60 * 1000

export interface HostResolverOptions {
  resolverService?: ResolverService
  logger?: Logger
  ttlMs?: number
  now?: () => number
}

/**
 * Resolves and caches the service's base host. In dynamic mode concurrent
 * callers share one resolution; there is never more than one outstanding
 * resolver-service call per resolver.
 */
export class HostResolver {
  private readonly state: HostState
  private readonly resolverService?: ResolverService
  private readonly logger: Logger
  private readonly ttlMs: number
  private readonly now: () => number

  private constructor(state: HostState, options: HostResolverOptions) {
    this.state = state
    this.resolverService = options.resolverService
    this.logger = options.logger ?? createLogger('HostResolver')
    this.ttlMs = options.ttlMs ?? HOST_CACHE_TTL_MS
    this.now = options.now ?? Date.now
  }

  static fixed(host: string, options: HostResolverOptions = {}): HostResolver {
    return new HostResolver({ mode: 'static', host }, options)
  }

  static discovered(serviceName: string, env: string, options: HostResolverOptions): HostResolver {
    return new HostResolver({ mode: 'dynamic', serviceName, env }, options)
  }

  get mode(): HostState['mode'] {
    return this.state.mode
  }

  /**
   * Cached host, if any, without triggering a resolution
   */
  get cachedHost(): string | undefined {
    if (this.state.mode === 'static') {
      return this.state.host
    }
    return this.state.cached?.host
  }

  async getHost(): Promise<string> {
    const state = this.state
    if (state.mode === 'static') {
      return state.host
    }

    const dynamic: DynamicHostState = state
    if (dynamic.cached && this.now() < dynamic.cached.expiresAt) {
      return dynamic.cached.host
    }

    if (dynamic.inFlight) {
      return dynamic.inFlight
    }

    const inFlight = this.resolve(dynamic.serviceName, dynamic.env)
      .then((host) => {
        dynamic.cached = { host, expiresAt: this.now() + this.ttlMs }
        return host
      })
      .finally(() => {
        dynamic.inFlight = undefined
      })
    dynamic.cached = undefined
    dynamic.inFlight = inFlight
    return inFlight
  }

  /**
   * Forgets the cached host; the next call resolves again
   */
  invalidate(): void {
    if (this.state.mode === 'dynamic') {
      this.state.cached = undefined
    }
  }

  private async resolve(serviceName: string, env: string): Promise<string> {
    if (!this.resolverService) {
      throw new ResolutionError('No resolver service configured', { details: { serviceName, env } })
    }

    let host: string
    try {
      const session = await this.resolverService.connect(env)
      try {
        host = await session.getHost(serviceName)
      }
      finally {
        await session.close()
      }
    }
    catch (error) {
      if (error instanceof ResolutionError) {
        throw error
      }
      const cause = toError(error)
      throw new ResolutionError(`Failed to resolve ${serviceName} in ${env}: ${cause.message}`, {
        details: { serviceName, env },
        cause,
      })
    }

    if (typeof host !== 'string' || host.trim() === '') {
      throw new ResolutionError(`Resolver returned no host for ${serviceName} in ${env}`, {
        details: { serviceName, env },
      })
    }

    this.logger.info(`Resolved ${serviceName} to ${host}`, { serviceName, env })
    return host
  }
}
