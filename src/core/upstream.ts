import { WebSocket, type RawData } from 'ws'
import type { Persona } from '../types/index.js'
import { UpstreamUnavailableError, errorMessage } from './errors.js'
import { parseJsonObject, readObject, readString } from './json.js'
import { silentLogger, type Logger } from './logger.js'

/**
 * Events an upstream session reports back to its connection
 */
export interface UpstreamHandlers {
  /** Synthesized PCM16 audio */
  onAudio(chunk: Buffer): void
  /** Final text of a response (transcript or text turn) */
  onText(text: string): void
  /** One audio response finished */
  onAudioDone(): void
  /** Non-fatal error reported by the provider */
  onError(message: string): void
  /** Connection lost without close() being called */
  onUnexpectedClose(code: number, reason: string): void
}

/**
 * A live speech-to-speech session bound to one persona
 */
export interface UpstreamSession {
  readonly isOpen: boolean
  /** Bytes queued locally but not yet written to the network */
  readonly bufferedAmount: number
  appendAudio(chunk: Buffer): void
  /** Out-of-band text turn */
  sendText(text: string): void
  /** End of a spoken turn: commit buffered input and request a response */
  commitAudio(): void
  close(): Promise<void>
}

export interface UpstreamOpenOptions {
  /** Aborts an in-flight connect */
  signal?: AbortSignal
  /** Speak the persona greeting once connected (default: true) */
  greet?: boolean
}

/**
 * Opens upstream sessions
 * Rejects with UpstreamUnavailableError when the provider cannot be reached
 */
export type UpstreamFactory = (
  persona: Persona,
  handlers: UpstreamHandlers,
  options?: UpstreamOpenOptions
) => Promise<UpstreamSession>

/**
 * Realtime upstream configuration
 */
export interface RealtimeUpstreamConfig {
  /** Provider API key; without it no upstream is created */
  apiKey?: string
  /** Realtime endpoint (default: 'wss://api.openai.com/v1/realtime') */
  url?: string
  /** Model name appended as ?model= */
  model?: string
  /** Connect timeout in ms (default: 10000) */
  connectTimeoutMs?: number
  /** Speak the persona greeting when a session opens (default: true) */
  greeting?: boolean
  /** Upper bound on response length (default: 150) */
  maxResponseOutputTokens?: number
}

const DEFAULT_REALTIME_CONFIG = {
  url: 'wss://api.openai.com/v1/realtime',
  model: 'gpt-4o-realtime-preview-2024-10-01',
  connectTimeoutMs: 10_000,
  greeting: true,
  maxResponseOutputTokens: 150
}

const CONVERSATION_STYLE =
  'You are having a natural voice conversation. Respond conversationally and keep replies to one or two sentences. Acknowledge what the user says and keep the conversation going.'

function eventId(prefix: string): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(7)}`
}

/**
 * Upstream session speaking the OpenAI Realtime event protocol over ws
 */
export class RealtimeUpstream implements UpstreamSession {
  private ws: WebSocket
  private handlers: UpstreamHandlers
  private logger: Logger
  private closing = false

  private constructor(ws: WebSocket, handlers: UpstreamHandlers, logger: Logger) {
    this.ws = ws
    this.handlers = handlers
    this.logger = logger

    ws.on('message', (data: RawData, isBinary: boolean) => {
      if (!isBinary) {
        this.handleEvent(data.toString())
      }
    })

    ws.on('close', (code: number, reason: Buffer) => {
      if (!this.closing) {
        this.handlers.onUnexpectedClose(code, reason.toString())
      }
    })

    ws.on('error', (error) => {
      this.logger.error('Upstream socket error:', error)
    })
  }

  /**
   * Connect and configure a session for the persona
   * @throws UpstreamUnavailableError on timeout, abort or connection failure
   */
  static async connect(
    config: RealtimeUpstreamConfig & { apiKey: string },
    persona: Persona,
    handlers: UpstreamHandlers,
    options: UpstreamOpenOptions & { logger?: Logger } = {}
  ): Promise<RealtimeUpstream> {
    const settings = { ...DEFAULT_REALTIME_CONFIG, ...config }
    const logger = options.logger ?? silentLogger
    const url = `${settings.url}?model=${encodeURIComponent(settings.model)}`

    if (options.signal?.aborted) {
      throw new UpstreamUnavailableError('Upstream connect aborted')
    }

    const ws = new WebSocket(url, {
      headers: {
        Authorization: `Bearer ${settings.apiKey}`,
        'OpenAI-Beta': 'realtime=v1'
      },
      perMessageDeflate: false
    })

    await new Promise<void>((resolve, reject) => {
      const fail = (error: UpstreamUnavailableError) => {
        cleanup()
        // terminate() while connecting emits one more 'error'
        ws.on('error', (late: Error) => logger.debug(`Upstream socket discarded: ${late.message}`))
        ws.terminate()
        reject(error)
      }
      const onOpen = () => {
        cleanup()
        resolve()
      }
      const onError = (error: Error) => {
        fail(new UpstreamUnavailableError(`Upstream connect failed: ${error.message}`, { cause: error }))
      }
      const onAbort = () => {
        fail(new UpstreamUnavailableError('Upstream connect aborted'))
      }
      const timer = setTimeout(() => {
        fail(new UpstreamUnavailableError(`Upstream connect timed out after ${settings.connectTimeoutMs}ms`))
      }, settings.connectTimeoutMs)
      const cleanup = () => {
        clearTimeout(timer)
        ws.off('open', onOpen)
        ws.off('error', onError)
        options.signal?.removeEventListener('abort', onAbort)
      }

      ws.on('open', onOpen)
      ws.on('error', onError)
      options.signal?.addEventListener('abort', onAbort)
    })

    const upstream = new RealtimeUpstream(ws, handlers, logger)
    upstream.configure(persona, settings.maxResponseOutputTokens, settings.greeting && options.greet !== false)
    logger.info(`Upstream session opened for persona ${persona.id}`)
    return upstream
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN && !this.closing
  }

  get bufferedAmount(): number {
    return this.ws.bufferedAmount
  }

  appendAudio(chunk: Buffer): void {
    this.send('input_audio_buffer.append', { audio: chunk.toString('base64') })
  }

  sendText(text: string): void {
    this.send('conversation.item.create', {
      item: {
        id: eventId('msg'),
        type: 'message',
        role: 'user',
        content: [{ type: 'input_text', text }]
      }
    })
    this.send('response.create', { response: { modalities: ['text', 'audio'] } })
  }

  commitAudio(): void {
    this.send('input_audio_buffer.commit')
    this.send('response.create', { response: { modalities: ['text', 'audio'] } })
  }

  async close(): Promise<void> {
    if (this.closing) {
      return
    }
    this.closing = true

    if (this.ws.readyState === WebSocket.CLOSED) {
      return
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.ws.terminate()
        resolve()
      }, 1000)
      this.ws.once('close', () => {
        clearTimeout(timer)
        resolve()
      })
      this.ws.close(1000, 'session ended')
    })
  }

  private configure(persona: Persona, maxTokens: number, greeting: boolean): void {
    this.send('session.update', {
      session: {
        modalities: ['text', 'audio'],
        instructions: `${persona.prompt}\n\n${CONVERSATION_STYLE}`,
        voice: persona.voiceProfile.voice,
        input_audio_format: 'pcm16',
        output_audio_format: 'pcm16',
        input_audio_transcription: { model: 'whisper-1' },
        turn_detection: {
          type: 'server_vad',
          threshold: 0.6,
          prefix_padding_ms: 400,
          silence_duration_ms: 1200
        },
        temperature: persona.voiceProfile.temperature,
        max_response_output_tokens: maxTokens,
        tool_choice: 'none'
      }
    })
    this.send('input_audio_buffer.clear')

    if (greeting) {
      this.send('conversation.item.create', {
        item: {
          id: eventId('greeting'),
          type: 'message',
          role: 'assistant',
          content: [{ type: 'text', text: persona.greeting }]
        }
      })
      this.send('response.create', {
        response: {
          modalities: ['text', 'audio'],
          instructions: 'Speak this greeting naturally in your characteristic voice and tone.'
        }
      })
    }
  }

  private send(type: string, payload: Record<string, unknown> = {}): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      this.logger.warn(`Upstream not open, dropping ${type}`)
      return
    }
    this.ws.send(JSON.stringify({ event_id: eventId('evt'), type, ...payload }))
  }

  private handleEvent(text: string): void {
    const event = parseJsonObject(text)
    if (!event) {
      this.logger.warn('Ignoring malformed upstream event')
      return
    }

    const type = readString(event, 'type')
    this.logger.debug(`Upstream event: ${type}`)

    switch (type) {
      case 'response.audio.delta': {
        const delta = readString(event, 'delta')
        if (delta) {
          this.handlers.onAudio(Buffer.from(delta, 'base64'))
        }
        break
      }
      case 'response.audio.done':
        this.handlers.onAudioDone()
        break
      case 'response.audio_transcript.done': {
        const transcript = readString(event, 'transcript')
        if (transcript) {
          this.handlers.onText(transcript)
        }
        break
      }
      case 'response.text.done': {
        const value = readString(event, 'text')
        if (value) {
          this.handlers.onText(value)
        }
        break
      }
      case 'error': {
        const details = readObject(event, 'error')
        const message = (details && readString(details, 'message')) ?? 'Upstream error'
        this.logger.error(`Upstream reported error: ${message}`)
        this.handlers.onError(message)
        break
      }
      default:
        break
    }
  }
}

/**
 * Build the upstream factory for a configuration
 * @returns null when no API key is configured (fallback mode)
 */
export function createRealtimeUpstreamFactory(config: RealtimeUpstreamConfig, logger: Logger = silentLogger): UpstreamFactory | null {
  const apiKey = config.apiKey
  if (!apiKey) {
    return null
  }

  return async (persona, handlers, options = {}) => {
    try {
      return await RealtimeUpstream.connect({ ...config, apiKey }, persona, handlers, { ...options, logger })
    } catch (error) {
      if (error instanceof UpstreamUnavailableError) {
        throw error
      }
      throw new UpstreamUnavailableError(`Upstream connect failed: ${errorMessage(error)}`, { cause: error })
    }
  }
}
