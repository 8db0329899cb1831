/**
 * Client lifecycle and verb surface
 */

import type { DomainErrorClass } from '../http/errors.js'
import type { HttpMethod, HttpRequestOptions, Transport, TransportResponse } from '../http/types.js'
import type { Logger } from '../logging/index.js'
import type { ResolverService } from '../resolver/types.js'
import type { ClientConfigInput } from './config.js'
import { RequestDispatcher } from '../http/dispatcher.js'
import { ClientClosedError, ConfigurationError, toError } from '../http/errors.js'
import { FetchTransport } from '../http/fetchTransport.js'
import { createLogger } from '../logging/index.js'
import { HostResolver } from '../resolver/hostResolver.js'
import { ClientConfig, mergeClientConfig } from './config.js'
import { ExceptionRegistry } from './registry.js'

export type ClientState = 'constructed' | 'opening' | 'ready' | 'closed'

/**
 * Declarative defaults shared by every instance of a client class
 */
export interface ClientTemplate {
  serviceName?: string
  prefix?: string
  host?: string
  config?: ClientConfigInput
  exceptions?: Record<string, DomainErrorClass>
}

export interface ClientOptions {
  /** Discovery namespace, required in dynamic mode */
  env?: string
  serviceName?: string
  /** Explicit host; disables discovery for this instance */
  host?: string
  /** Path prefix applied to every request */
  prefix?: string
  config?: ClientConfigInput
  exceptions?: Record<string, DomainErrorClass>
  transport?: Transport
  resolverService?: ResolverService
  logger?: Logger
  /** Host cache clock, for tests */
  now?: () => number
  /** Backoff sleep, for tests */
  sleep?: (ms: number) => Promise<void>
}

export type RequestHandler<T> = (response: TransportResponse) => Promise<T> | T

export type VerbOptions = Omit<HttpRequestOptions, 'body'>

function isNonEmpty(value: string | undefined): value is string {
  return value !== undefined && value !== ''
}

/**
 * Releases the response once `handler` settles, on every path
 */
export async function withResponse<T>(pending: Promise<TransportResponse>, handler: RequestHandler<T>): Promise<T> {
  const response = await pending
  try {
    return await handler(response)
  }
  finally {
    await response.release()
  }
}

export class Client {
  readonly env?: string
  readonly serviceName?: string
  readonly prefix: string
  readonly config: ClientConfig
  readonly exceptions: ExceptionRegistry

  protected readonly logger: Logger
  private readonly transport: Transport
  private readonly hostResolver: HostResolver
  private readonly dispatcher: RequestDispatcher
  private currentState: ClientState = 'constructed'
  private opening?: Promise<this>
  private closing?: Promise<void>

  constructor(options: ClientOptions = {}, template: ClientTemplate = {}) {
    const transport = options.transport ?? new FetchTransport()
    try {
      if (isNonEmpty(template.serviceName) && isNonEmpty(options.serviceName)) {
        throw new ConfigurationError('\'serviceName\' specified at both template and instance level', {
          details: { field: 'serviceName' },
        })
      }
      if (isNonEmpty(template.prefix) && isNonEmpty(options.prefix)) {
        throw new ConfigurationError('\'prefix\' specified at both template and instance level', {
          details: { field: 'prefix' },
        })
      }

      this.logger = options.logger ?? createLogger(new.target.name !== '' ? new.target.name : 'Client')
      this.config = mergeClientConfig(template.config, options.config)
      this.exceptions = new ExceptionRegistry({ ...template.exceptions, ...options.exceptions })

      const host = isNonEmpty(options.host) ? options.host : template.host
      this.env = options.env
      this.serviceName = isNonEmpty(options.serviceName) ? options.serviceName : template.serviceName
      this.prefix = (isNonEmpty(options.prefix) ? options.prefix : template.prefix) ?? ''

      if (isNonEmpty(host)) {
        this.logger.info(`Running in static mode with host ${host}`)
        this.hostResolver = HostResolver.fixed(host, { logger: this.logger })
      }
      else {
        if (!isNonEmpty(this.serviceName) || !isNonEmpty(this.env)) {
          throw new ConfigurationError('Without a host, both \'serviceName\' and \'env\' must be provided')
        }
        if (!options.resolverService) {
          throw new ConfigurationError('Dynamic mode needs a resolverService to discover the host', {
            details: { serviceName: this.serviceName, env: this.env },
          })
        }
        this.logger.info('Running in auto-resolve mode', { serviceName: this.serviceName, env: this.env })
        this.hostResolver = HostResolver.discovered(this.serviceName, this.env, {
          resolverService: options.resolverService,
          logger: this.logger,
          now: options.now,
        })
      }
    }
    catch (error) {
      // The transport is ours from the start; release it before surfacing
      void transport.close().catch((closeError: unknown) => {
        createLogger('Client').warn('Failed to close transport after construction error', { error: toError(closeError) })
      })
      throw error
    }

    this.transport = transport
    this.dispatcher = new RequestDispatcher({
      hostResolver: this.hostResolver,
      transport,
      config: this.config,
      exceptions: this.exceptions,
      prefix: this.prefix,
      logger: this.logger,
      sleep: options.sleep,
    })
  }

  get state(): ClientState {
    return this.currentState
  }

  get mode(): 'static' | 'dynamic' {
    return this.hostResolver.mode
  }

  /**
   * Resolves the host up front in dynamic mode. On failure the client is
   * closed and the error propagates.
   */
  async open(): Promise<this> {
    if (this.currentState === 'closed') {
      throw new ClientClosedError('Cannot open a closed client')
    }
    this.opening ??= this.resolveOnOpen()
    return this.opening
  }

  private async resolveOnOpen(): Promise<this> {
    this.currentState = 'opening'
    try {
      await this.hostResolver.getHost()
    }
    catch (error) {
      await this.close()
      throw error
    }
    // close() may have run while resolving
    if (this.state === 'closed') {
      throw new ClientClosedError('Client was closed while opening')
    }
    this.currentState = 'ready'
    return this
  }

  /**
   * Releases the transport. Safe to call repeatedly and from any state.
   */
  async close(): Promise<void> {
    this.currentState = 'closed'
    this.closing ??= this.transport.close()
    return this.closing
  }

  async getHost(): Promise<string> {
    this.assertUsable()
    return this.hostResolver.getHost()
  }

  async getBaseUrl(): Promise<string> {
    this.assertUsable()
    return this.dispatcher.getBaseUrl()
  }

  registerError(tag: string, errorClass?: DomainErrorClass): this {
    this.exceptions.register(tag, errorClass)
    return this
  }

  /**
   * Issues a request. The caller owns the response and must release it;
   * prefer `request()` or `withResponse()` which do so.
   */
  async issue(method: HttpMethod, path: string, options?: HttpRequestOptions): Promise<TransportResponse> {
    this.assertUsable()
    return this.dispatcher.issue(method, path, options)
  }

  /**
   * Issues a request and hands the response to `handler`, releasing it
   * afterwards whatever happens
   */
  async request<T>(method: HttpMethod, path: string, options: HttpRequestOptions, handler: RequestHandler<T>): Promise<T> {
    return withResponse(this.issue(method, path, options), handler)
  }

  /**
   * Verb helpers. Without a handler the caller owns the response; with one the
   * response is released once the handler settles, as with `request()`.
   */
  get(path: string, options?: VerbOptions): Promise<TransportResponse>
  get<T>(path: string, options: VerbOptions | undefined, handler: RequestHandler<T>): Promise<T>
  async get<T>(path: string, options?: VerbOptions, handler?: RequestHandler<T>): Promise<TransportResponse | T> {
    return this.send('GET', path, options, handler)
  }

  post(path: string, body?: string | object, options?: VerbOptions): Promise<TransportResponse>
  post<T>(path: string, body: string | object | undefined, options: VerbOptions | undefined, handler: RequestHandler<T>): Promise<T>
  async post<T>(path: string, body?: string | object, options?: VerbOptions, handler?: RequestHandler<T>): Promise<TransportResponse | T> {
    return this.send('POST', path, { ...options, body }, handler)
  }

  put(path: string, body?: string | object, options?: VerbOptions): Promise<TransportResponse>
  put<T>(path: string, body: string | object | undefined, options: VerbOptions | undefined, handler: RequestHandler<T>): Promise<T>
  async put<T>(path: string, body?: string | object, options?: VerbOptions, handler?: RequestHandler<T>): Promise<TransportResponse | T> {
    return this.send('PUT', path, { ...options, body }, handler)
  }

  patch(path: string, body?: string | object, options?: VerbOptions): Promise<TransportResponse>
  patch<T>(path: string, body: string | object | undefined, options: VerbOptions | undefined, handler: RequestHandler<T>): Promise<T>
  async patch<T>(path: string, body?: string | object, options?: VerbOptions, handler?: RequestHandler<T>): Promise<TransportResponse | T> {
    return this.send('PATCH', path, { ...options, body }, handler)
  }

  delete(path: string, options?: VerbOptions): Promise<TransportResponse>
  delete<T>(path: string, options: VerbOptions | undefined, handler: RequestHandler<T>): Promise<T>
  async delete<T>(path: string, options?: VerbOptions, handler?: RequestHandler<T>): Promise<TransportResponse | T> {
    return this.send('DELETE', path, options, handler)
  }

  head(path: string, options?: VerbOptions): Promise<TransportResponse>
  head<T>(path: string, options: VerbOptions | undefined, handler: RequestHandler<T>): Promise<T>
  async head<T>(path: string, options?: VerbOptions, handler?: RequestHandler<T>): Promise<TransportResponse | T> {
    return this.send('HEAD', path, options, handler)
  }

  private async send<T>(
    method: HttpMethod,
    path: string,
    options: HttpRequestOptions | undefined,
    handler: RequestHandler<T> | undefined,
  ): Promise<TransportResponse | T> {
    const pending = this.issue(method, path, options)
    return handler ? withResponse(pending, handler) : pending
  }

  private assertUsable(): void {
    if (this.currentState === 'closed') {
      throw new ClientClosedError()
    }
  }
}

export type ClientClass = new (options?: ClientOptions) => Client

/**
 * Creates a client class whose instances start from `template`
 */
export function defineClient(template: ClientTemplate): ClientClass {
  const frozen = Object.freeze({ ...template })
  return class extends Client {
    constructor(options: ClientOptions = {}) {
      super(options, frozen)
    }
  }
}

/**
 * Opens the client, runs `fn`, and closes the client on every path
 */
export async function withClient<C extends Client, T>(client: C, fn: (client: C) => Promise<T>): Promise<T> {
  try {
    await client.open()
    return await fn(client)
  }
  finally {
    await client.close()
  }
}
