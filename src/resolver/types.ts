/**
 * Naming-service collaborator. A session is opened around each resolution
 * and closed right after; nothing is held between resolutions.
 */
export interface ResolverSession {
  getHost: (serviceName: string) => Promise<string>
  close: () => Promise<void>
}

export interface ResolverService {
  connect: (env: string) => Promise<ResolverSession>
}

export type HostState
  = { mode: 'static', host: string }
    | {
      mode: 'dynamic'
      serviceName: string
      env: string
      cached?: { host: string, expiresAt: number }
      inFlight?: Promise<string>
    }
