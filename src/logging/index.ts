/**
 * Centralized structured logging with automatic sensitive data redaction
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogMetadata {
  [key: string]: unknown
}

export interface Logger {
  debug: (message: string, meta?: LogMetadata) => void
  info: (message: string, meta?: LogMetadata) => void
  warn: (message: string, meta?: LogMetadata) => void
  error: (message: string, meta?: LogMetadata) => void
}

export interface LoggerOptions {
  /** Records below this level are dropped */
  level?: LogLevel
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

const SENSITIVE_KEYS = new Set([
  'authorization',
  'x-api-key',
  'cookie',
  'set-cookie',
  'x-auth-token',
  'password',
  'token',
  'apikey',
  'api_key',
  'secret',
])

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value)
}

function redactSensitiveData(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message }
  }

  if (Array.isArray(value)) {
    return value.map(item => redactSensitiveData(item))
  }

  if (typeof value === 'object') {
    const redacted: Record<string, unknown> = {}
    for (const [key, val] of Object.entries(value)) {
      redacted[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : redactSensitiveData(val)
    }
    return redacted
  }

  return value
}

function formatLogMessage(level: LogLevel, message: string, meta?: LogMetadata): string {
  const timestamp = new Date().toISOString()
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`

  if (!meta || Object.keys(meta).length === 0) {
    return `${prefix} ${message}`
  }

  return `${prefix} ${message} ${JSON.stringify(redactSensitiveData(meta))}`
}

export function createLogger(name?: string, options: LoggerOptions = {}): Logger {
  const logPrefix = (name !== undefined && name !== '') ? `[${name}] ` : ''
  const threshold = LEVEL_ORDER[options.level ?? 'info']

  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold

  return {
    debug(message: string, meta?: LogMetadata) {
      if (enabled('debug')) {
        console.debug(formatLogMessage('debug', logPrefix + message, meta))
      }
    },

    info(message: string, meta?: LogMetadata) {
      if (enabled('info')) {
        // eslint-disable-next-line no-console
        console.log(formatLogMessage('info', logPrefix + message, meta))
      }
    },

    warn(message: string, meta?: LogMetadata) {
      if (enabled('warn')) {
        console.warn(formatLogMessage('warn', logPrefix + message, meta))
      }
    },

    error(message: string, meta?: LogMetadata) {
      console.error(formatLogMessage('error', logPrefix + message, meta))
    },
  }
}

/**
 * A logger that drops every record
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
