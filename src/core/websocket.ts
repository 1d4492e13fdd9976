import type { IncomingMessage, Server as HttpServer } from 'http'
import type { Duplex } from 'stream'
import { WebSocketServer, WebSocket, type RawData } from 'ws'
import type { InboundFrame } from '../types/index.js'
import { silentLogger, type Logger } from './logger.js'

/**
 * WebSocket server configuration
 */
export interface WebSocketConfig {
  /** Path prefix; clients connect to `${pathPrefix}/<clientId>` (default: '/ws') */
  pathPrefix?: string
  /** Heartbeat ping interval in ms (default: 15000) */
  pingInterval?: number
  /** Maximum payload size in bytes (default: 10MB) */
  maxPayload?: number
  /** Enable per-message deflate compression (default: false, audio does not compress) */
  perMessageDeflate?: boolean
}

/**
 * Event handlers for WebSocket connections
 */
export interface WebSocketHandlers {
  /** Called when a new connection is established */
  onConnection?: (ws: WebSocket, clientId: string) => void | Promise<void>
  /** Called when a frame is received */
  onMessage?: (ws: WebSocket, clientId: string, frame: InboundFrame) => void | Promise<void>
  /** Called when connection closes */
  onClose?: (ws: WebSocket, clientId: string, code: number) => void | Promise<void>
  /** Called when an error occurs */
  onError?: (ws: WebSocket, clientId: string, error: Error) => void
}

/**
 * Per-socket tracking
 */
interface SocketInfo {
  clientId: string
  isAlive: boolean
}

const CLIENT_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/

export type ClientIdResult =
  | { ok: true; clientId: string }
  | { ok: false; status: 400 | 404 }

/**
 * Extract the client id from an upgrade request path
 * Paths outside the prefix are 404, malformed ids under it 400
 */
export function parseClientId(url: string | undefined, pathPrefix: string = '/ws'): ClientIdResult {
  const pathname = (url ?? '').split('?')[0]
  const prefix = `${pathPrefix.replace(/\/$/, '')}/`
  if (!pathname.startsWith(prefix)) {
    return { ok: false, status: 404 }
  }

  let clientId: string
  try {
    clientId = decodeURIComponent(pathname.slice(prefix.length))
  } catch {
    return { ok: false, status: 400 }
  }

  return CLIENT_ID_PATTERN.test(clientId) ? { ok: true, clientId } : { ok: false, status: 400 }
}

function rejectUpgrade(socket: Duplex, status: 400 | 404): void {
  const text = status === 400 ? 'Bad Request' : 'Not Found'
  socket.once('finish', () => socket.destroy())
  socket.end(`HTTP/1.1 ${status} ${text}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`)
}

/**
 * Relay WebSocket Server
 * Attaches to an HTTP server and accepts one socket per client id path
 */
export class RelayWebSocketServer {
  private wss: WebSocketServer | null = null
  private server: HttpServer | null = null
  private sockets: Map<WebSocket, SocketInfo> = new Map()
  private heartbeatTimer: NodeJS.Timeout | null = null
  private config: Required<WebSocketConfig>
  private handlers: WebSocketHandlers
  private logger: Logger

  private readonly onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer): void => {
    this.handleUpgrade(request, socket, head)
  }

  constructor(config: WebSocketConfig = {}, handlers: WebSocketHandlers = {}, logger: Logger = silentLogger) {
    this.config = {
      pathPrefix: '/ws',
      pingInterval: 15000,
      maxPayload: 10 * 1024 * 1024,
      perMessageDeflate: false,
      ...config
    }
    this.handlers = handlers
    this.logger = logger
  }

  /**
   * Start accepting upgrades on an HTTP server
   */
  attach(server: HttpServer): void {
    if (this.wss) {
      this.logger.warn('WebSocket server already running')
      return
    }

    this.wss = new WebSocketServer({
      noServer: true,
      perMessageDeflate: this.config.perMessageDeflate,
      maxPayload: this.config.maxPayload
    })

    this.wss.on('error', (error) => {
      this.logger.error('WebSocket server error:', error)
    })

    this.server = server
    server.on('upgrade', this.onUpgrade)

    // Set up heartbeat to detect dead connections
    this.heartbeatTimer = setInterval(() => {
      this.heartbeat()
    }, this.config.pingInterval)
  }

  /**
   * Stop the WebSocket server
   */
  async stop(): Promise<void> {
    // Stop heartbeat
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer)
      this.heartbeatTimer = null
    }

    if (this.server) {
      this.server.off('upgrade', this.onUpgrade)
      this.server = null
    }

    // Close all active connections
    for (const [ws] of this.sockets) {
      try {
        ws.close(1001, 'server shutting down')
      } catch (error) {
        this.logger.error('Error closing WebSocket:', error)
      }
    }
    this.sockets.clear()

    const wss = this.wss
    this.wss = null
    if (wss) {
      await new Promise<void>((resolve) => {
        wss.close(() => {
          this.logger.debug('WebSocket server closed')
          resolve()
        })
      })
    }
  }

  /**
   * Send data to a specific WebSocket
   */
  send(ws: WebSocket, data: Buffer | string): boolean {
    if (ws.readyState !== WebSocket.OPEN) {
      return false
    }

    try {
      if (typeof data === 'string') {
        ws.send(data)
      } else {
        ws.send(data, { binary: true })
      }
      return true
    } catch (error) {
      this.logger.error('Error sending data:', error)
      return false
    }
  }

  /**
   * Send JSON message
   */
  sendJson(ws: WebSocket, obj: Record<string, unknown>): boolean {
    return this.send(ws, JSON.stringify(obj))
  }

  /**
   * Close a socket if it is still open
   */
  close(ws: WebSocket, code: number, reason: string): void {
    if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
      ws.close(code, reason)
    }
  }

  get connectionCount(): number {
    return this.sockets.size
  }

  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const wss = this.wss
    if (!wss) {
      rejectUpgrade(socket, 404)
      return
    }

    const result = parseClientId(request.url, this.config.pathPrefix)
    if (!result.ok) {
      this.logger.debug(`Rejecting upgrade for ${request.url}: ${result.status}`)
      rejectUpgrade(socket, result.status)
      return
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      this.handleConnection(ws, result.clientId)
    })
  }

  /**
   * Heartbeat to detect dead connections
   */
  private heartbeat(): void {
    for (const [ws, info] of this.sockets) {
      if (!info.isAlive) {
        this.logger.info(`Terminating dead connection: ${info.clientId}`)
        ws.terminate()
        this.sockets.delete(ws)
        continue
      }

      info.isAlive = false
      try {
        ws.ping()
      } catch (error) {
        this.logger.error('Error sending ping:', error)
      }
    }
  }

  /**
   * Handle new WebSocket connection
   */
  private handleConnection(ws: WebSocket, clientId: string): void {
    this.logger.info(`WebSocket connection established: ${clientId}`)

    const info: SocketInfo = { clientId, isAlive: true }
    this.sockets.set(ws, info)

    ws.on('pong', () => {
      info.isAlive = true
    })

    if (this.handlers.onConnection) {
      Promise.resolve(this.handlers.onConnection(ws, clientId)).catch(error => {
        this.logger.error('Error in onConnection handler:', error)
      })
    }

    ws.on('message', (data: RawData, isBinary: boolean) => {
      this.handleMessage(ws, info, data, isBinary)
    })

    ws.on('error', (error) => {
      this.logger.error(`WebSocket error for ${clientId}:`, error)
      if (this.handlers.onError) {
        this.handlers.onError(ws, clientId, error)
      }
    })

    ws.on('close', (code: number) => {
      this.logger.info(`WebSocket connection closed: ${clientId}`)
      this.sockets.delete(ws)

      if (this.handlers.onClose) {
        Promise.resolve(this.handlers.onClose(ws, clientId, code)).catch(error => {
          this.logger.error('Error in onClose handler:', error)
        })
      }
    })
  }

  /**
   * Dispatch a frame by its type: text frames carry control JSON, binary frames PCM16
   */
  private handleMessage(ws: WebSocket, info: SocketInfo, data: RawData, isBinary: boolean): void {
    info.isAlive = true

    const frame: InboundFrame = isBinary
      ? { type: 'audio', data: toBuffer(data) }
      : { type: 'text', message: toBuffer(data).toString('utf8') }

    if (this.handlers.onMessage) {
      Promise.resolve(this.handlers.onMessage(ws, info.clientId, frame)).catch(error => {
        this.logger.error('Error processing message:', error)
        this.sendJson(ws, {
          type: 'error',
          message: 'Failed to process message'
        })
      })
    }
  }
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data)
  }
  return Buffer.from(data)
}
