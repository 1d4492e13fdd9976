/**
 * persona-voice-relay: real-time PCM16 voice relay between browsers and a
 * hosted speech-to-speech model, with switchable personas
 *
 * @packageDocumentation
 */

// Core exports
export * from './core/index.js'
export * from './types/index.js'
export { loadConfigFromEnv } from './config.js'

import { createServer, type Server as HttpServer } from 'http'
import type { WebSocket } from 'ws'
import { ConnectionSession, type ConnectionConfig } from './core/connection.js'
import { createHttpApp } from './core/http.js'
import { createConsoleLogger, type Logger } from './core/logger.js'
import { PersonaCatalog } from './core/personas.js'
import { encodeRelayEvent } from './core/protocol.js'
import { SessionRegistry, type RegistryConfig } from './core/registry.js'
import { createRealtimeUpstreamFactory, type RealtimeUpstreamConfig, type UpstreamFactory } from './core/upstream.js'
import { RelayWebSocketServer, type WebSocketConfig } from './core/websocket.js'
import type { InboundFrame } from './types/index.js'

/**
 * HTTP listener configuration
 */
export interface HttpConfig {
  /** Port to listen on; 0 picks a free one */
  port: number
  /** Host to bind to (default: '0.0.0.0') */
  host?: string
  /** Directory served as static files */
  staticDir?: string
}

/**
 * Voice Server configuration
 */
export interface VoiceServerConfig {
  http: HttpConfig
  /** WebSocket transport configuration */
  websocket?: WebSocketConfig
  /** Session registry configuration */
  registry?: RegistryConfig
  /** Per-connection limits */
  connection?: ConnectionConfig
  /** Speech upstream; without an apiKey sessions use fallback responses */
  upstream?: RealtimeUpstreamConfig
  /** Replaces the realtime upstream (null forces fallback mode) */
  upstreamFactory?: UpstreamFactory | null
  /** Persona catalog (default: the bundled data/personas.json) */
  catalog?: PersonaCatalog
  /** How often idle upstreams are swept in ms (default: 30000) */
  idleCheckIntervalMs?: number
  /** Enable verbose logging */
  verbose?: boolean
  logger?: Logger
}

/**
 * High-level Voice Server
 * Orchestrates HTTP, WebSocket transport, the session registry and per-connection sessions
 */
export class VoiceServer {
  private config: VoiceServerConfig
  private logger: Logger
  private catalog: PersonaCatalog
  private registry: SessionRegistry
  private wsServer: RelayWebSocketServer
  private upstreamFactory: UpstreamFactory | null
  private httpServer: HttpServer | null = null
  private idleTimer: NodeJS.Timeout | null = null

  // Track WebSocket to session mapping
  private wsToSession: WeakMap<WebSocket, ConnectionSession> = new WeakMap()

  constructor(config: VoiceServerConfig) {
    this.config = config
    this.logger = config.logger ?? createConsoleLogger({ verbose: config.verbose, scope: 'relay' })
    this.catalog = config.catalog ?? PersonaCatalog.fromFile()

    this.upstreamFactory = config.upstreamFactory !== undefined
      ? config.upstreamFactory
      : createRealtimeUpstreamFactory(config.upstream ?? {}, this.logger)

    if (!this.upstreamFactory) {
      this.logger.warn('No speech upstream configured (OPENAI_API_KEY unset); personas will use fallback responses')
    }

    // Create session registry
    this.registry = new SessionRegistry(config.registry ?? {}, {
      onRegister: (session) => this.logger.debug(`Session registered: ${session.clientId}`),
      onUnregister: (session) => this.logger.debug(`Session unregistered: ${session.clientId}`),
      onIdle: (session) => {
        this.logger.info(`Releasing idle upstream for ${session.clientId}`)
        return session.releaseUpstream()
      }
    }, this.logger)

    // Create WebSocket server with handlers
    this.wsServer = new RelayWebSocketServer(config.websocket ?? {}, {
      onConnection: (ws, clientId) => this.onConnection(ws, clientId),
      onMessage: (ws, clientId, frame) => this.onMessage(ws, clientId, frame),
      onClose: (ws, clientId) => this.onClose(ws, clientId),
      onError: (_ws, clientId, error) => this.onError(clientId, error)
    }, this.logger)
  }

  /**
   * Start the voice server
   * @returns The bound port
   */
  async start(): Promise<number> {
    if (this.httpServer) {
      this.logger.warn('Voice server already running')
      return this.port()
    }

    const app = createHttpApp({
      catalog: this.catalog,
      registry: this.registry,
      staticDir: this.config.http.staticDir,
      logger: this.logger
    })

    const server = createServer(app)
    this.wsServer.attach(server)

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(this.config.http.port, this.config.http.host ?? '0.0.0.0', () => {
        server.off('error', reject)
        resolve()
      })
    })
    this.httpServer = server

    this.idleTimer = setInterval(() => {
      this.registry.checkIdleSessions()
    }, this.config.idleCheckIntervalMs ?? 30_000)
    this.idleTimer.unref()

    const port = this.port()
    this.logger.info(`Voice server listening on http://${this.config.http.host ?? '0.0.0.0'}:${port} (WebSocket: /ws/<clientId>)`)
    return port
  }

  /**
   * Stop the voice server
   */
  async stop(): Promise<void> {
    if (this.idleTimer) {
      clearInterval(this.idleTimer)
      this.idleTimer = null
    }

    this.registry.broadcast({ type: 'error', message: 'Server is shutting down' })
    await this.registry.clearAll()
    await this.wsServer.stop()

    const server = this.httpServer
    this.httpServer = null
    if (server) {
      server.closeAllConnections()
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()))
      })
    }

    this.logger.info('Voice server stopped')
  }

  /**
   * Get session registry
   */
  getRegistry(): SessionRegistry {
    return this.registry
  }

  getCatalog(): PersonaCatalog {
    return this.catalog
  }

  private port(): number {
    const address = this.httpServer?.address()
    return address && typeof address === 'object' ? address.port : this.config.http.port
  }

  /**
   * Handle new WebSocket connection
   */
  private onConnection(ws: WebSocket, clientId: string): void {
    const session = new ConnectionSession({
      clientId,
      catalog: this.catalog,
      upstreamFactory: this.upstreamFactory,
      config: this.config.connection,
      logger: this.logger,
      channel: {
        send: (event) => {
          this.wsServer.send(ws, encodeRelayEvent(event))
        },
        close: (code, reason) => {
          this.wsServer.close(ws, code, reason)
        }
      }
    })

    this.wsToSession.set(ws, session)

    const previous = this.registry.register(session)
    if (previous) {
      this.logger.warn(`Client ${clientId} reconnected; closing previous session`)
      previous.close('replaced by a new connection').catch(error => {
        this.logger.error(`Error closing replaced session ${clientId}:`, error)
      })
    }
  }

  /**
   * Handle WebSocket frame
   */
  private async onMessage(ws: WebSocket, clientId: string, frame: InboundFrame): Promise<void> {
    const session = this.wsToSession.get(ws)
    if (!session) {
      this.logger.warn(`No session for ${clientId}, dropping ${frame.type} frame`)
      return
    }

    this.registry.touch(clientId)
    await session.handleFrame(frame)
  }

  /**
   * Handle WebSocket close
   */
  private async onClose(ws: WebSocket, clientId: string): Promise<void> {
    const session = this.wsToSession.get(ws)
    if (!session) {
      return
    }

    this.wsToSession.delete(ws)
    this.registry.unregister(clientId, session)
    await session.close('client disconnected')
  }

  /**
   * Handle WebSocket error
   */
  private onError(clientId: string, error: Error): void {
    this.logger.error(`WebSocket error for ${clientId}: ${error.message}`)
  }
}

/**
 * Default export
 */
export default VoiceServer
