import type { HttpMethod, Transport, TransportRequestOptions, TransportResponse } from '../http/types.js'
import type { ResolverService, ResolverSession } from '../resolver/types.js'

export class StubResponse implements TransportResponse {
  readonly headers: Headers
  released = false
  reads = 0

  constructor(
    readonly status: number,
    private readonly body: string = '',
    readonly statusText: string = '',
    readonly url: string = '',
  ) {
    this.headers = new Headers()
  }

  async text(): Promise<string> {
    this.reads++
    return this.body
  }

  async json<T = unknown>(): Promise<T> {
    return JSON.parse(await this.text()) as T
  }

  async release(): Promise<void> {
    this.released = true
  }
}

export function jsonResponse(status: number, payload: unknown): StubResponse {
  return new StubResponse(status, JSON.stringify(payload))
}

export interface RecordedRequest {
  method: HttpMethod
  url: string
  options: TransportRequestOptions
}

type Outcome = StubResponse | Error

/**
 * In-process transport answering from a script of outcomes; the last
 * outcome repeats once the script runs out
 */
export class StubTransport implements Transport {
  readonly requests: RecordedRequest[] = []
  closeCount = 0
  private readonly outcomes: Outcome[]

  constructor(...outcomes: Outcome[]) {
    this.outcomes = outcomes
  }

  async request(method: HttpMethod, url: string, options: TransportRequestOptions): Promise<TransportResponse> {
    this.requests.push({ method, url, options })
    const outcome = this.outcomes.length > 1 ? this.outcomes.shift() : this.outcomes[0]
    if (outcome === undefined) {
      return new StubResponse(200)
    }
    if (outcome instanceof Error) {
      throw outcome
    }
    return outcome
  }

  async close(): Promise<void> {
    this.closeCount++
  }
}

/**
 * Resolver service whose lookups stay pending until `settle` is called
 */
export class StubResolverService implements ResolverService {
  connects = 0
  lookups: string[] = []
  closes = 0
  private pending: Array<{ resolve: (host: string) => void, reject: (error: Error) => void }> = []

  constructor(private readonly answer?: (serviceName: string, env: string) => Promise<string>) {}

  async connect(env: string): Promise<ResolverSession> {
    this.connects++
    return {
      getHost: async (serviceName) => {
        this.lookups.push(`${env}/${serviceName}`)
        if (this.answer) {
          return this.answer(serviceName, env)
        }
        return new Promise<string>((resolve, reject) => {
          this.pending.push({ resolve, reject })
        })
      },
      close: async () => {
        this.closes++
      },
    }
  }

  get waiting(): number {
    return this.pending.length
  }

  resolveAll(host: string): void {
    for (const entry of this.pending.splice(0)) {
      entry.resolve(host)
    }
  }

  rejectAll(error: Error): void {
    for (const entry of this.pending.splice(0)) {
      entry.reject(error)
    }
  }
}

/**
 * Lets pending promise callbacks run
 */
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve()
  }
}
