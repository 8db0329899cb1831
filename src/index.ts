/**
 * service-client: request dispatch for a backend whose host is fixed or
 * discovered through a naming service
 */

export { Client, defineClient, withClient, withResponse } from './client/client.js'
export { ClientConfig, DEFAULT_RETRY_STATUS_PATTERNS, DEFAULT_TIMEOUT_MS, mergeClientConfig } from './client/config.js'
export { ExceptionRegistry, isErrorPayload } from './client/registry.js'
export { loadConfigFromEnv } from './config/index.js'
export * from './http/index.js'
export { createLogger, silentLogger } from './logging/index.js'
export { HOST_CACHE_TTL_MS, HostResolver } from './resolver/hostResolver.js'
export { HttpResolverService } from './resolver/httpResolverService.js'
export type { ClientClass, ClientOptions, ClientState, ClientTemplate, RequestHandler, VerbOptions } from './client/client.js'
export type { ClientConfigInput, ClientConfigOptions } from './client/config.js'
export type { AppConfig } from './config/index.js'
export type { Logger, LoggerOptions, LogLevel, LogMetadata } from './logging/index.js'
export type { HostResolverOptions } from './resolver/hostResolver.js'
export type { HttpResolverServiceOptions } from './resolver/httpResolverService.js'
export type { HostState, ResolverService, ResolverSession } from './resolver/types.js'
