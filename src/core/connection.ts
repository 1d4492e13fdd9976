import type { ConnectionState, InboundFrame, Persona, RelayEvent } from '../types/index.js'
import { RelayError, SessionClosedError, UpstreamUnavailableError, errorMessage } from './errors.js'
import { silentLogger, type Logger } from './logger.js'
import { toPersonaView, type PersonaCatalog } from './personas.js'
import { parseControlMessage, timestamp } from './protocol.js'
import type { TrackedSession } from './registry.js'
import type { UpstreamFactory, UpstreamHandlers, UpstreamSession } from './upstream.js'

/**
 * Outbound side of a client connection
 */
export interface ClientChannel {
  send(event: RelayEvent): void
  close(code: number, reason: string): void
}

/**
 * Per-connection limits
 */
export interface ConnectionConfig {
  /** Inbound frames waiting to be processed before audio is dropped (default: 64) */
  maxPendingFrames?: number
  /** Inbound frames waiting to be processed before text is rejected too (default: 256) */
  maxPendingTextFrames?: number
  /** Upstream bytes queued on the socket before audio is dropped (default: 1MB) */
  maxUpstreamBufferedBytes?: number
}

export interface ConnectionOptions {
  clientId: string
  catalog: PersonaCatalog
  channel: ClientChannel
  /** null runs the session in fallback mode */
  upstreamFactory: UpstreamFactory | null
  config?: ConnectionConfig
  logger?: Logger
  now?: () => number
}

/**
 * Connection Session
 *
 * One per client socket. Holds the selected persona and at most one upstream
 * session, processes inbound frames strictly in arrival order and relays
 * upstream events back to the client.
 *
 * idle → persona_selected → streaming, and closed from anywhere.
 */
export class ConnectionSession implements TrackedSession {
  readonly clientId: string
  readonly createdAt: number

  private catalog: PersonaCatalog
  private channel: ClientChannel
  private upstreamFactory: UpstreamFactory | null
  private config: Required<ConnectionConfig>
  private logger: Logger
  private now: () => number

  private currentState: ConnectionState = 'idle'
  private persona: Persona | null = null
  private upstream: UpstreamSession | null = null
  /** Bumped whenever the upstream changes; stale opens and events are discarded */
  private upstreamGeneration = 0
  private openController: AbortController | null = null
  private upstreamUnavailable = false

  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  constructor(options: ConnectionOptions) {
    this.clientId = options.clientId
    this.catalog = options.catalog
    this.channel = options.channel
    this.upstreamFactory = options.upstreamFactory
    this.config = {
      maxPendingFrames: 64,
      maxPendingTextFrames: 256,
      maxUpstreamBufferedBytes: 1024 * 1024,
      ...options.config
    }
    this.logger = options.logger ?? silentLogger
    this.now = options.now ?? Date.now
    this.createdAt = this.now()
  }

  get state(): ConnectionState {
    return this.currentState
  }

  get personaId(): string | null {
    return this.persona?.id ?? null
  }

  get hasUpstream(): boolean {
    return this.upstream !== null
  }

  get pendingFrames(): number {
    return this.pending
  }

  /**
   * Queue an inbound socket frame
   * Resolves once the frame has been processed (or discarded)
   */
  handleFrame(frame: InboundFrame): Promise<void> {
    if (this.currentState === 'closed') {
      this.logger.debug(`Discarding ${frame.type} frame for closed session ${this.clientId}`)
      return Promise.resolve()
    }

    if (frame.type === 'audio' && this.pending >= this.config.maxPendingFrames) {
      this.logger.warn(`Session ${this.clientId} backlog full, dropping ${frame.data.length} audio bytes`)
      return Promise.resolve()
    }

    if (frame.type === 'text' && this.pending >= this.config.maxPendingTextFrames) {
      this.logger.warn(`Session ${this.clientId} backlog full, rejecting control message`)
      this.notify({ type: 'error', message: 'Too many pending messages' })
      return Promise.resolve()
    }

    return this.enqueue(() => this.processFrame(frame))
  }

  /**
   * Select (or reselect) a persona
   * @returns persona_selected on success, error for an unknown id
   * @throws SessionClosedError
   */
  async selectPersona(personaId: string): Promise<RelayEvent> {
    this.assertOpen()

    const result = this.catalog.lookup(personaId)
    if (!result.found) {
      this.logger.warn(`Session ${this.clientId}: ${result.error.message}`)
      return { type: 'error', message: result.error.message }
    }

    const persona = result.persona
    if (this.persona === persona && this.upstream?.isOpen) {
      this.currentState = 'persona_selected'
      return this.personaSelectedEvent(persona, true)
    }

    await this.releaseUpstream()
    this.assertOpen()

    this.persona = persona
    this.upstreamUnavailable = false
    this.currentState = 'persona_selected'

    const connected = await this.openUpstream(persona, true)
    this.assertOpen()

    this.logger.info(`Session ${this.clientId} selected persona ${persona.id}${connected ? '' : ' (offline mode)'}`)
    return this.personaSelectedEvent(persona, connected)
  }

  /**
   * Send a text turn
   * @returns The fallback reply when no upstream is available, an error
   * without a persona, and null when the upstream will answer
   * @throws SessionClosedError
   */
  async chat(message: string): Promise<RelayEvent | null> {
    this.assertOpen()

    const persona = this.persona
    if (!persona) {
      return { type: 'error', message: 'Please select a persona first.' }
    }

    const upstream = await this.currentUpstream(persona)
    if (upstream) {
      upstream.sendText(message)
      return null
    }

    return {
      type: 'ai_response',
      message: this.catalog.fallbackResponse(persona.id, message),
      timestamp: timestamp(new Date(this.now()))
    }
  }

  /**
   * Forward one PCM16 frame upstream, unmodified
   * @throws SessionClosedError
   */
  async forwardAudio(data: Buffer): Promise<void> {
    this.assertOpen()

    const persona = this.persona
    if (!persona) {
      this.logger.debug(`Session ${this.clientId}: audio before persona selection dropped`)
      return
    }

    const upstream = await this.currentUpstream(persona)
    this.currentState = 'streaming'

    if (!upstream) {
      return
    }

    if (upstream.bufferedAmount > this.config.maxUpstreamBufferedBytes) {
      this.logger.warn(`Session ${this.clientId}: upstream backlog ${upstream.bufferedAmount} bytes, dropping audio`)
      return
    }

    upstream.appendAudio(data)
  }

  /**
   * End the current spoken turn
   * @throws SessionClosedError
   */
  stop(): void {
    this.assertOpen()

    if (this.currentState !== 'streaming') {
      return
    }

    if (this.upstream?.isOpen) {
      this.upstream.commitAudio()
    }
    this.currentState = 'persona_selected'
  }

  /**
   * Send an event to the client, unless closed
   */
  notify(event: RelayEvent): void {
    if (this.currentState === 'closed') {
      return
    }
    this.channel.send(event)
  }

  /**
   * Tear down the upstream session, keeping the persona
   * The next chat or audio frame opens a fresh one
   */
  async releaseUpstream(): Promise<void> {
    this.upstreamGeneration++

    if (this.openController) {
      this.openController.abort()
      this.openController = null
    }

    const upstream = this.upstream
    this.upstream = null

    if (this.currentState === 'streaming') {
      this.currentState = 'persona_selected'
    }

    if (upstream) {
      try {
        await upstream.close()
      } catch (error) {
        this.logger.error(`Session ${this.clientId}: error closing upstream:`, error)
      }
      this.logger.debug(`Session ${this.clientId}: upstream released`)
    }
  }

  /**
   * Close the session; safe to call more than once
   */
  async close(reason: string, code: number = 1000): Promise<void> {
    if (this.currentState === 'closed') {
      return
    }

    this.currentState = 'closed'
    this.logger.info(`Session ${this.clientId} closed: ${reason}`)

    await this.releaseUpstream()
    this.channel.close(code, reason)
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    this.pending++

    const run = this.tail
      .then(task)
      .catch(error => this.handleTaskError(error))
      .finally(() => {
        this.pending--
      })

    this.tail = run
    return run
  }

  private async processFrame(frame: InboundFrame): Promise<void> {
    if (frame.type === 'audio') {
      await this.forwardAudio(frame.data)
      return
    }

    const message = parseControlMessage(frame.message)
    switch (message.type) {
      case 'select_persona':
        this.notify(await this.selectPersona(message.persona_id))
        break
      case 'chat_message': {
        const reply = await this.chat(message.message)
        if (reply) {
          this.notify(reply)
        }
        break
      }
      case 'stop':
        this.stop()
        break
    }
  }

  private handleTaskError(error: unknown): void {
    if (error instanceof SessionClosedError) {
      this.logger.debug(error.message)
      return
    }

    if (error instanceof RelayError) {
      this.logger.warn(`Session ${this.clientId}: ${error.message}`)
      this.notify({ type: 'error', message: error.message })
      return
    }

    this.logger.error(`Error processing message for ${this.clientId}: ${errorMessage(error)}`)
    this.notify({ type: 'error', message: 'Failed to process message' })
  }

  private assertOpen(): void {
    if (this.currentState === 'closed') {
      throw new SessionClosedError(this.clientId)
    }
  }

  /**
   * The open upstream, reopening one lazily after an idle release
   */
  private async currentUpstream(persona: Persona): Promise<UpstreamSession | null> {
    if (!this.upstream && this.upstreamFactory && !this.upstreamUnavailable) {
      await this.openUpstream(persona, false)
      this.assertOpen()
    }
    return this.upstream?.isOpen ? this.upstream : null
  }

  private async openUpstream(persona: Persona, greet: boolean): Promise<boolean> {
    if (!this.upstreamFactory) {
      this.upstreamUnavailable = true
      return false
    }

    const generation = ++this.upstreamGeneration
    const controller = new AbortController()
    this.openController = controller

    try {
      const upstream = await this.upstreamFactory(persona, this.upstreamHandlers(generation), {
        signal: controller.signal,
        greet
      })

      if (generation !== this.upstreamGeneration || this.currentState === 'closed') {
        await upstream.close()
        return false
      }

      this.upstream = upstream
      return true
    } catch (error) {
      if (error instanceof UpstreamUnavailableError) {
        this.upstreamUnavailable = true
        this.logger.warn(`Session ${this.clientId}: ${error.message}, using fallback responses`)
        return false
      }
      throw error
    } finally {
      if (this.openController === controller) {
        this.openController = null
      }
    }
  }

  private upstreamHandlers(generation: number): UpstreamHandlers {
    const current = () => generation === this.upstreamGeneration && this.currentState !== 'closed'

    return {
      onAudio: (chunk) => {
        if (current()) {
          this.notify({ type: 'audio_chunk', data: chunk })
        }
      },
      onText: (text) => {
        if (current()) {
          this.notify({ type: 'ai_response', message: text, timestamp: timestamp(new Date(this.now())) })
        }
      },
      onAudioDone: () => {
        if (current()) {
          this.notify({ type: 'audio_done', timestamp: timestamp(new Date(this.now())) })
        }
      },
      onError: (message) => {
        if (current()) {
          this.notify({ type: 'error', message })
        }
      },
      onUnexpectedClose: (code, reason) => {
        if (!current()) {
          return
        }
        this.logger.error(`Session ${this.clientId}: upstream closed unexpectedly (${code} ${reason})`)
        this.upstream = null
        this.close('upstream failure').catch(error => {
          this.logger.error(`Error closing session ${this.clientId}:`, error)
        })
      }
    }
  }

  private personaSelectedEvent(persona: Persona, connected: boolean): RelayEvent {
    return {
      type: 'persona_selected',
      persona: toPersonaView(persona),
      message: connected ? `Voice chat with ${persona.name} is ready!` : `${persona.name} is ready (offline mode).`
    }
  }
}
