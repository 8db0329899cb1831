import { describe, expect, it, vi } from 'vitest'
import { ResolutionError } from '../http/errors.js'
import { HttpResolverService } from '../resolver/httpResolverService.js'

function fetchAnswering(response: () => Response) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => response())
}

async function lookup(service: HttpResolverService, env: string, name: string): Promise<unknown> {
  const session = await service.connect(env)
  try {
    return await session.getHost(name)
  }
  catch (error) {
    return error
  }
  finally {
    await session.close()
  }
}

describe('httpResolverService', () => {
  it('looks the service up under its env', async () => {
    const fetchMock = fetchAnswering(() => Response.json({ host: 'http://10.0.0.7:8080' }))
    const service = new HttpResolverService({ baseUrl: 'http://naming.internal/', fetch: fetchMock })

    await expect(lookup(service, 'prod', 'users')).resolves.toBe('http://10.0.0.7:8080')

    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('http://naming.internal/prod/services/users')
    expect(init?.method).toBe('GET')
    expect(init?.headers).toEqual({ accept: 'application/json' })
  })

  it('encodes path segments', async () => {
    const fetchMock = fetchAnswering(() => Response.json({ host: 'http://h' }))
    const service = new HttpResolverService({ baseUrl: 'http://naming', fetch: fetchMock })

    await lookup(service, 'eu west', 'billing/v2')

    expect(fetchMock.mock.calls[0][0]).toBe('http://naming/eu%20west/services/billing%2Fv2')
  })

  it('reports an unregistered service', async () => {
    const service = new HttpResolverService({
      baseUrl: 'http://naming',
      fetch: fetchAnswering(() => new Response('', { status: 404 })),
    })

    const error = await lookup(service, 'prod', 'users')

    expect(error).toBeInstanceOf(ResolutionError)
    expect(error).toHaveProperty('message', 'Service users is not registered in prod')
    expect(error).toHaveProperty('details.status', 404)
  })

  it('reports other failing statuses with the body as cause', async () => {
    const service = new HttpResolverService({
      baseUrl: 'http://naming',
      fetch: fetchAnswering(() => new Response('registry offline', { status: 500 })),
    })

    const error = await lookup(service, 'prod', 'users')

    expect(error).toHaveProperty('message', 'Lookup of users failed (500)')
    expect(error).toHaveProperty('cause.message', 'registry offline')
  })

  it('rejects malformed JSON', async () => {
    const service = new HttpResolverService({
      baseUrl: 'http://naming',
      fetch: fetchAnswering(() => new Response('not json', { status: 200 })),
    })

    await expect(lookup(service, 'prod', 'users')).resolves.toHaveProperty('message', 'Lookup of users returned malformed JSON')
  })

  it('rejects an answer without a host', async () => {
    const service = new HttpResolverService({
      baseUrl: 'http://naming',
      fetch: fetchAnswering(() => Response.json({ address: '10.0.0.7' })),
    })

    await expect(lookup(service, 'prod', 'users')).resolves.toHaveProperty('message', 'Lookup of users returned no host')
  })

  it('wraps network failures', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed')
    })
    const service = new HttpResolverService({ baseUrl: 'http://naming', fetch: fetchMock })

    const error = await lookup(service, 'prod', 'users')

    expect(error).toBeInstanceOf(ResolutionError)
    expect(error).toHaveProperty('message', 'Lookup of users network failure: fetch failed')
  })

  it('aborts a pending lookup when the session closes', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit): Promise<Response> =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new DOMException('This operation was aborted', 'AbortError')))
      }))
    const service = new HttpResolverService({ baseUrl: 'http://naming', requestTimeoutMs: 60_000, fetch: fetchMock })

    const session = await service.connect('prod')
    const pending = session.getHost('users').catch((caught: unknown) => caught)
    await session.close()

    await expect(pending).resolves.toHaveProperty('message', 'Lookup of users aborted/timeout after 60000ms')
  })
})
