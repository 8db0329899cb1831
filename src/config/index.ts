import type { LogLevel } from '../logging/index.js'
import process from 'node:process'
import { ConfigurationError } from '../http/errors.js'
import { isLogLevel } from '../logging/index.js'

/**
 * Process-level settings read from the environment. Used by the CLI and by
 * callers that build clients from deployment config.
 */
export interface AppConfig {
  host?: string
  serviceName?: string
  env?: string
  prefix: string
  requestTimeoutMs: number
  resolverUrl?: string
  logLevel: LogLevel
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed !== undefined && trimmed.length > 0 ? trimmed : undefined
}

function parsePositiveInt(value: unknown, fallback: number): number {
  const num = Number(value)
  if (!Number.isFinite(num) || num < 0)
    return fallback
  return Math.floor(num)
}

export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const resolverUrl = optionalString(env.SERVICE_CLIENT_RESOLVER_URL)
  if (resolverUrl !== undefined) {
    try {
      void new URL(resolverUrl)
    }
    catch (urlError) {
      throw new ConfigurationError(`Invalid SERVICE_CLIENT_RESOLVER_URL: ${resolverUrl}`, {
        details: { field: 'SERVICE_CLIENT_RESOLVER_URL' },
        cause: urlError,
      })
    }
  }

  const logLevelRaw = optionalString(env.SERVICE_CLIENT_LOG_LEVEL)?.toLowerCase()
  const logLevel = isLogLevel(logLevelRaw) ? logLevelRaw : 'info'

  return {
    host: optionalString(env.SERVICE_CLIENT_HOST),
    serviceName: optionalString(env.SERVICE_CLIENT_SERVICE),
    env: optionalString(env.SERVICE_CLIENT_ENV),
    prefix: optionalString(env.SERVICE_CLIENT_PREFIX) ?? '',
    requestTimeoutMs: parsePositiveInt(env.SERVICE_CLIENT_TIMEOUT_MS ?? 30000, 30000),
    resolverUrl,
    logLevel,
  }
}
