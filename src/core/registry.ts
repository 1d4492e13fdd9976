import type { ConnectionState, RelayEvent } from '../types/index.js'
import { silentLogger, type Logger } from './logger.js'

/**
 * What the registry needs from a connection session
 */
export interface TrackedSession {
  readonly clientId: string
  readonly state: ConnectionState
  readonly personaId: string | null
  readonly createdAt: number
  readonly hasUpstream: boolean
  notify(event: RelayEvent): void
  releaseUpstream(): Promise<void>
  close(reason: string): Promise<void>
}

/**
 * Registry configuration
 */
export interface RegistryConfig {
  /** Release an upstream after this long without client activity (default: 5min) */
  idleTimeoutMs?: number
}

/**
 * Registry callbacks
 */
export interface RegistryCallbacks {
  /** Called when a session is registered */
  onRegister?: (session: TrackedSession) => void
  /** Called when a session is removed */
  onUnregister?: (session: TrackedSession) => void
  /** Called for a session whose upstream has been idle too long */
  onIdle?: (session: TrackedSession) => void | Promise<void>
}

export interface SessionSummary {
  clientId: string
  state: ConnectionState
  personaId: string | null
  createdAt: string
}

/**
 * Read-only registry statistics
 */
export interface RegistrySnapshot {
  activeSessions: number
  clients: string[]
  /** Sessions per selected persona id */
  personaUsage: Record<string, number>
  sessions: SessionSummary[]
}

interface Entry {
  session: TrackedSession
  lastActivity: number
}

/**
 * Session Registry
 * Process-wide map of client id → connection session. Every mutation is a
 * synchronous method, so the event loop serializes writers.
 */
export class SessionRegistry {
  private entries: Map<string, Entry> = new Map()
  private config: Required<RegistryConfig>
  private callbacks: RegistryCallbacks
  private logger: Logger

  constructor(config: RegistryConfig = {}, callbacks: RegistryCallbacks = {}, logger: Logger = silentLogger) {
    this.config = {
      idleTimeoutMs: 5 * 60_000,
      ...config
    }
    this.callbacks = callbacks
    this.logger = logger
  }

  /**
   * Insert a session
   * @returns The session previously registered under the same client id, which the caller must close
   */
  register(session: TrackedSession, now: number = Date.now()): TrackedSession | null {
    const previous = this.entries.get(session.clientId)?.session ?? null
    this.entries.set(session.clientId, { session, lastActivity: now })

    if (previous && this.callbacks.onUnregister) {
      this.callbacks.onUnregister(previous)
    }
    if (this.callbacks.onRegister) {
      this.callbacks.onRegister(session)
    }
    return previous
  }

  /**
   * Remove a session
   * With `session` given, only that exact instance is removed, so a stale
   * close handler cannot evict its replacement
   */
  unregister(clientId: string, session?: TrackedSession): boolean {
    const entry = this.entries.get(clientId)
    if (!entry || (session && entry.session !== session)) {
      return false
    }

    this.entries.delete(clientId)
    if (this.callbacks.onUnregister) {
      this.callbacks.onUnregister(entry.session)
    }
    return true
  }

  /**
   * Record client activity
   */
  touch(clientId: string, now: number = Date.now()): void {
    const entry = this.entries.get(clientId)
    if (entry) {
      entry.lastActivity = now
    }
  }

  has(clientId: string): boolean {
    return this.entries.has(clientId)
  }

  get size(): number {
    return this.entries.size
  }

  snapshot(): RegistrySnapshot {
    const personaUsage: Record<string, number> = {}
    const sessions: SessionSummary[] = []

    for (const { session } of this.entries.values()) {
      if (session.personaId) {
        personaUsage[session.personaId] = (personaUsage[session.personaId] ?? 0) + 1
      }
      sessions.push({
        clientId: session.clientId,
        state: session.state,
        personaId: session.personaId,
        createdAt: new Date(session.createdAt).toISOString()
      })
    }

    return {
      activeSessions: sessions.length,
      clients: sessions.map(s => s.clientId),
      personaUsage,
      sessions
    }
  }

  /**
   * Deliver an event to every session
   * @returns Number of sessions notified
   */
  broadcast(event: RelayEvent, excludeClientId?: string): number {
    let count = 0
    for (const [clientId, { session }] of this.entries) {
      if (clientId === excludeClientId) {
        continue
      }
      session.notify(event)
      count++
    }
    return count
  }

  /**
   * Report sessions holding an upstream without recent activity
   * @returns Client ids reported idle
   */
  checkIdleSessions(now: number = Date.now()): string[] {
    const idle: string[] = []

    for (const [clientId, entry] of this.entries) {
      if (!entry.session.hasUpstream || now - entry.lastActivity <= this.config.idleTimeoutMs) {
        continue
      }
      idle.push(clientId)
      if (this.callbacks.onIdle) {
        Promise.resolve(this.callbacks.onIdle(entry.session)).catch(error => {
          this.logger.error(`Error in onIdle callback for ${clientId}:`, error)
        })
      }
    }

    return idle
  }

  /**
   * Close and remove every session
   */
  async clearAll(reason: string = 'server shutdown'): Promise<void> {
    const sessions = Array.from(this.entries.values(), entry => entry.session)
    this.entries.clear()

    for (const session of sessions) {
      await session.close(reason)
      if (this.callbacks.onUnregister) {
        this.callbacks.onUnregister(session)
      }
    }
  }
}
