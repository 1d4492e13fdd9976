import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import WebSocket from 'ws'
import { silentLogger } from './core/logger.js'
import type { UpstreamFactory, UpstreamHandlers } from './core/upstream.js'
import { VoiceServer } from './index.js'

/**
 * Collects JSON events and binary frames from one client socket
 */
class TestClient {
  readonly events: Record<string, unknown>[] = []
  readonly audio: Buffer[] = []
  closeCode: number | null = null

  private constructor(readonly ws: WebSocket) {
    ws.on('message', (data, isBinary) => {
      const buffer = Buffer.isBuffer(data) ? data : Array.isArray(data) ? Buffer.concat(data) : Buffer.from(data)
      if (isBinary) {
        this.audio.push(buffer)
        return
      }
      const parsed: unknown = JSON.parse(buffer.toString())
      if (typeof parsed === 'object' && parsed !== null) {
        this.events.push(Object.fromEntries(Object.entries(parsed)))
      }
    })
    ws.on('close', (code) => {
      this.closeCode = code
    })
  }

  static connect(url: string): Promise<TestClient> {
    const ws = new WebSocket(url)
    const client = new TestClient(ws)
    return new Promise((resolve, reject) => {
      ws.once('open', () => resolve(client))
      ws.once('error', reject)
    })
  }

  send(message: object): void {
    this.ws.send(JSON.stringify(message))
  }

  async next(count: number): Promise<Record<string, unknown>> {
    await vi.waitFor(() => expect(this.events.length).toBeGreaterThanOrEqual(count))
    return this.events[count - 1]
  }
}

describe('VoiceServer', () => {
  let server: VoiceServer
  let port: number
  const clients: TestClient[] = []

  async function connect(clientId: string): Promise<TestClient> {
    const client = await TestClient.connect(`ws://127.0.0.1:${port}/ws/${clientId}`)
    clients.push(client)
    return client
  }

  async function startServer(upstreamFactory: UpstreamFactory | null): Promise<void> {
    server = new VoiceServer({
      http: { port: 0, host: '127.0.0.1' },
      upstreamFactory,
      logger: silentLogger
    })
    port = await server.start()
  }

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      client.ws.terminate()
    }
    await server.stop()
  })

  describe('in offline mode', () => {
    beforeEach(async () => {
      await startServer(null)
    })

    it('answers chat from the persona fallback script', async () => {
      const client = await connect('browser-1')

      client.send({ type: 'select_persona', persona_id: 'astrologer' })
      expect(await client.next(1)).toEqual({
        type: 'persona_selected',
        persona: {
          id: 'astrologer',
          name: 'Gold Astrologer',
          description: 'Wise and compassionate astrologer offering mystical insights',
          color: '#FFD700',
          icon: '🌟',
          voice: 'nova'
        },
        message: 'Gold Astrologer is ready (offline mode).'
      })

      client.send({ type: 'chat_message', message: 'hi' })
      expect(await client.next(2)).toMatchObject({
        type: 'ai_response',
        message:
          'Welcome, kindred spirit. The universe has guided you here for a reason. Share what weighs on your heart, and let the stars light your path forward.'
      })
    })

    it('reports unknown personas and bad messages without closing', async () => {
      const client = await connect('browser-2')

      client.send({ type: 'select_persona', persona_id: 'pirate' })
      expect(await client.next(1)).toEqual({ type: 'error', message: 'Unknown persona: pirate' })

      client.ws.send('not json')
      expect(await client.next(2)).toEqual({ type: 'error', message: 'Invalid message: expected a JSON object' })

      client.send({ type: 'chat_message', message: 'hello?' })
      expect(await client.next(3)).toEqual({ type: 'error', message: 'Please select a persona first.' })
      expect(client.closeCode).toBeNull()
    })

    it('tracks connections in the registry and stats endpoint', async () => {
      const client = await connect('browser-3')
      client.send({ type: 'select_persona', persona_id: 'health' })
      await client.next(1)

      const res = await fetch(`http://127.0.0.1:${port}/api/stats`)
      expect(await res.json()).toEqual({
        active_connections: 1,
        connected_clients: ['browser-3'],
        available_personas: 6,
        persona_usage: { health: 1 }
      })

      client.ws.close()
      await vi.waitFor(() => expect(server.getRegistry().has('browser-3')).toBe(false))
    })

    it('replaces the session of a reconnecting client', async () => {
      const first = await connect('browser-4')
      const second = await connect('browser-4')

      await vi.waitFor(() => expect(first.closeCode).toBe(1000))
      expect(server.getRegistry().size).toBe(1)

      second.send({ type: 'select_persona', persona_id: 'cars' })
      expect(await second.next(1)).toMatchObject({ type: 'persona_selected' })
      expect(server.getRegistry().size).toBe(1)
    })
  })

  describe('with an upstream', () => {
    let handlers: UpstreamHandlers | null
    let appended: Buffer[]

    beforeEach(async () => {
      handlers = null
      appended = []
      await startServer(async (_persona, upstreamHandlers) => {
        handlers = upstreamHandlers
        return {
          isOpen: true,
          bufferedAmount: 0,
          appendAudio: (chunk) => {
            appended.push(chunk)
          },
          sendText: (text) => upstreamHandlers.onText(`echo: ${text}`),
          commitAudio: () => {},
          close: async () => {}
        }
      })
    })

    it('relays audio both ways and text responses', async () => {
      const client = await connect('browser-5')

      client.send({ type: 'select_persona', persona_id: 'general' })
      expect(await client.next(1)).toMatchObject({ message: 'Voice chat with Business Conversationalist is ready!' })

      client.ws.send(Buffer.from([1, 0, 2, 0]))
      await vi.waitFor(() => expect(appended).toEqual([Buffer.from([1, 0, 2, 0])]))

      handlers?.onAudio(Buffer.from([9, 9]))
      await vi.waitFor(() => expect(client.audio).toEqual([Buffer.from([9, 9])]))

      client.send({ type: 'chat_message', message: 'ping' })
      expect(await client.next(2)).toMatchObject({ type: 'ai_response', message: 'echo: ping' })
    })
  })
})
