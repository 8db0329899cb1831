import type { ClientOptions } from '../client/client.js'
import type { AppConfig } from '../config/index.js'
import type { HttpMethod } from '../http/types.js'
import process from 'node:process'
import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { Client, withClient } from '../client/client.js'
import { loadConfigFromEnv } from '../config/index.js'
import { ClientError } from '../http/errors.js'
import { createLogger } from '../logging/index.js'
import { HttpResolverService } from '../resolver/httpResolverService.js'

const METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS']

interface TargetFlags {
  retryStatus?: string[]
  host?: string
  service?: string
  env?: string
  prefix?: string
  resolverUrl?: string
  timeout?: number
}

interface RequestFlags extends TargetFlags {
  data?: string
  header: string[]
}

export interface CliIo {
  out: (line: string) => void
  err: (line: string) => void
  loadConfig: () => AppConfig
  createClient: (options: ClientOptions) => Client
}

const defaultIo: CliIo = {
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`),
  loadConfig: () => loadConfigFromEnv(),
  createClient: options => new Client(options),
}

function parseMethod(value: string): HttpMethod {
  const method = METHODS.find(candidate => candidate === value.toUpperCase())
  if (!method) {
    throw new InvalidArgumentError(`Expected one of ${METHODS.join(', ')}`)
  }
  return method
}

function parseTimeout(value: string): number {
  const ms = Number(value)
  if (!Number.isFinite(ms) || ms < 0) {
    throw new InvalidArgumentError('Timeout must be a non-negative number of milliseconds')
  }
  return ms
}

function collectHeader(value: string, previous: string[]): string[] {
  if (!value.includes(':')) {
    throw new InvalidArgumentError('Headers must look like "Name: value"')
  }
  return [...previous, value]
}

function parseHeaders(lines: string[]): Record<string, string> {
  const headers: Record<string, string> = {}
  for (const line of lines) {
    const index = line.indexOf(':')
    headers[line.slice(0, index).trim()] = line.slice(index + 1).trim()
  }
  return headers
}

/**
 * Builds client options from flags, falling back to the environment
 */
export function toClientOptions(flags: TargetFlags, config: AppConfig): ClientOptions {
  const host = flags.host ?? config.host
  const resolverUrl = flags.resolverUrl ?? config.resolverUrl
  const timeoutMs = flags.timeout ?? config.requestTimeoutMs

  return {
    host,
    serviceName: flags.service ?? config.serviceName,
    env: flags.env ?? config.env,
    prefix: flags.prefix ?? config.prefix,
    config: flags.retryStatus ? { timeoutMs, retryStatusPatterns: flags.retryStatus } : { timeoutMs },
    logger: createLogger('service-client', { level: config.logLevel }),
    resolverService: host === undefined && resolverUrl !== undefined
      ? new HttpResolverService({ baseUrl: resolverUrl, requestTimeoutMs: timeoutMs })
      : undefined,
  }
}

function addTargetOptions(command: Command): Command {
  return command
    .option('--host <url>', 'Explicit host; disables discovery')
    .option('--service <name>', 'Service name to discover')
    .option('--env <name>', 'Discovery namespace')
    .option('--prefix <path>', 'Path prefix applied to every request')
    .option('--resolver-url <url>', 'Base URL of the naming service')
    .option('--timeout <ms>', 'Per-attempt timeout in milliseconds', parseTimeout)
}

export function createProgram(io: CliIo = defaultIo): Command {
  const program = new Command()
  program
    .name('service-client')
    .description('Issue requests against a fixed or discovered service host')
    .exitOverride()
    .configureOutput({
      writeOut: str => io.out(str.trimEnd()),
      writeErr: str => io.err(str.trimEnd()),
    })

  addTargetOptions(program.command('resolve'))
    .description('Print the host the client resolves to')
    .action(async (flags: TargetFlags) => {
      const client = io.createClient(toClientOptions(flags, io.loadConfig()))
      const baseUrl = await withClient(client, async opened => opened.getBaseUrl())
      io.out(baseUrl)
    })

  addTargetOptions(program.command('request'))
    .description('Issue one request and print the status line and body')
    .argument('<method>', 'HTTP method', parseMethod)
    .argument('<path>', 'Path appended to the base URL')
    .option('-d, --data <body>', 'Request body; JSON is sent as application/json')
    .option('-H, --header <header>', 'Extra header "Name: value", repeatable', collectHeader, [])
    .option('--retry-status <patterns...>', 'Status codes or families to retry, e.g. 503 5xx')
    .action(async (method: HttpMethod, path: string, flags: RequestFlags) => {
      const options = toClientOptions(flags, io.loadConfig())
      const headers = parseHeaders(flags.header)
      const body = flags.data === undefined ? undefined : parseBody(flags.data)

      const client = io.createClient(options)
      await withClient(client, async opened => opened.request(method, path, { headers, body }, async (response) => {
        io.out(`${response.status} ${response.statusText}`.trimEnd())
        const text = method === 'HEAD' ? '' : await response.text()
        if (text !== '') {
          io.out(text)
        }
      }))
    })

  return program
}

function parseBody(data: string): string | object {
  try {
    const parsed: unknown = JSON.parse(data)
    return typeof parsed === 'object' && parsed !== null ? parsed : data
  }
  catch {
    return data
  }
}

export async function main(argv: string[] = process.argv, io: CliIo = defaultIo): Promise<void> {
  try {
    await createProgram(io).parseAsync(argv)
  }
  catch (error) {
    if (error instanceof CommanderError) {
      // commander already printed usage or the parse error
      process.exitCode = error.exitCode
      return
    }
    if (error instanceof ClientError) {
      io.err(`❌ ${error.name} (${error.code}): ${error.message}`)
    }
    else if (error instanceof Error) {
      io.err(`❌ Error: ${error.message}`)
    }
    else {
      io.err('❌ An unexpected error occurred')
    }
    process.exitCode = 1
  }
}

// Check if this module is being run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  void main()
}
