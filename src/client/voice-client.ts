import type { ControlMessage, PersonaView } from '../types/index.js'
import { parseJsonObject, readObject, readString } from '../core/json.js'
import type { BinarySink } from './chunk-relay.js'

/**
 * JSON events the relay sends to the browser
 * (binary audio is delivered separately through onAudio)
 */
export type ServerEvent =
  | { type: 'persona_selected'; persona: PersonaView; message: string }
  | { type: 'ai_response'; message: string; timestamp: string }
  | { type: 'audio_done'; timestamp: string }
  | { type: 'error'; message: string }

/**
 * The subset of the browser WebSocket the client drives
 */
export interface ClientSocket extends BinarySink {
  binaryType: BinaryType
  onopen: ((event: Event) => void) | null
  onclose: ((event: CloseEvent) => void) | null
  onmessage: ((event: MessageEvent) => void) | null
  send(data: string | ArrayBuffer): void
  close(code?: number, reason?: string): void
}

export interface VoiceChatHandlers {
  onEvent?: (event: ServerEvent) => void
  onAudio?: (chunk: Uint8Array) => void
  onOpen?: () => void
  onClose?: (code: number) => void
}

export interface VoiceChatClientConfig {
  /** Relay origin, e.g. "ws://localhost:8000" */
  baseUrl: string
  clientId: string
  /** Socket constructor (default: the global WebSocket) */
  createSocket?: (url: string) => ClientSocket
}

function readPersona(value: object): PersonaView | null {
  const persona = readObject(value, 'persona')
  if (!persona) {
    return null
  }
  const id = readString(persona, 'id')
  const name = readString(persona, 'name')
  if (id === null || name === null) {
    return null
  }
  return {
    id,
    name,
    description: readString(persona, 'description') ?? '',
    color: readString(persona, 'color') ?? '',
    icon: readString(persona, 'icon') ?? '',
    voice: readString(persona, 'voice') ?? ''
  }
}

/**
 * Parse one JSON text frame from the relay
 * @returns The event, or null for anything unrecognized
 */
export function parseServerEvent(text: string): ServerEvent | null {
  const value = parseJsonObject(text)
  if (!value) {
    return null
  }

  const message = readString(value, 'message')
  const timestamp = readString(value, 'timestamp')

  switch (readString(value, 'type')) {
    case 'persona_selected': {
      const persona = readPersona(value)
      return persona ? { type: 'persona_selected', persona, message: message ?? '' } : null
    }
    case 'ai_response':
      return message !== null && timestamp !== null ? { type: 'ai_response', message, timestamp } : null
    case 'audio_done':
      return timestamp !== null ? { type: 'audio_done', timestamp } : null
    case 'error':
      return message !== null ? { type: 'error', message } : null
    default:
      return null
  }
}

/**
 * Browser side of the relay connection
 */
export class VoiceChatClient {
  private socket: ClientSocket | null = null
  private config: Required<VoiceChatClientConfig>
  private handlers: VoiceChatHandlers

  constructor(config: VoiceChatClientConfig, handlers: VoiceChatHandlers = {}) {
    this.config = {
      createSocket: (url) => new WebSocket(url),
      ...config
    }
    this.handlers = handlers
  }

  get url(): string {
    return `${this.config.baseUrl.replace(/\/$/, '')}/ws/${encodeURIComponent(this.config.clientId)}`
  }

  /**
   * Socket for the capture bridge, once connected
   */
  get sink(): BinarySink | null {
    return this.socket
  }

  connect(): void {
    if (this.socket) {
      return
    }

    const socket = this.config.createSocket(this.url)
    socket.binaryType = 'arraybuffer'

    // Events from a socket that has since been replaced are ignored
    socket.onopen = () => {
      if (this.socket === socket) {
        this.handlers.onOpen?.()
      }
    }

    socket.onclose = (event) => {
      if (this.socket !== socket) {
        return
      }
      this.socket = null
      this.handlers.onClose?.(event.code)
    }

    socket.onmessage = (event) => {
      if (this.socket !== socket) {
        return
      }
      if (event.data instanceof ArrayBuffer) {
        this.handlers.onAudio?.(new Uint8Array(event.data))
        return
      }
      if (typeof event.data !== 'string') {
        return
      }
      const parsed = parseServerEvent(event.data)
      if (parsed) {
        this.handlers.onEvent?.(parsed)
      } else {
        console.warn('Ignoring unrecognized server message')
      }
    }

    this.socket = socket
  }

  selectPersona(personaId: string): boolean {
    return this.sendControl({ type: 'select_persona', persona_id: personaId })
  }

  sendChat(message: string): boolean {
    return this.sendControl({ type: 'chat_message', message })
  }

  /**
   * End the current spoken turn
   */
  stopSpeaking(): boolean {
    return this.sendControl({ type: 'stop' })
  }

  disconnect(): void {
    const socket = this.socket
    this.socket = null
    if (socket) {
      socket.onopen = null
      socket.onmessage = null
      socket.onclose = null
      socket.close(1000, 'client closed')
    }
  }

  private sendControl(message: ControlMessage): boolean {
    if (!this.socket || this.socket.readyState !== 1) {
      return false
    }
    this.socket.send(JSON.stringify(message))
    return true
  }
}
