import { createServer, type Server } from 'http'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import WebSocket from 'ws'
import type { InboundFrame } from '../types/index.js'
import { parseClientId, RelayWebSocketServer } from './websocket.js'

describe('parseClientId', () => {
  it.each([
    ['/ws/abc', 'abc'],
    ['/ws/device_01-A', 'device_01-A'],
    ['/ws/abc?token=1', 'abc']
  ])('accepts %s', (url, clientId) => {
    expect(parseClientId(url)).toEqual({ ok: true, clientId })
  })

  it.each([
    ['/ws/', 400],
    ['/ws/has%20space', 400],
    ['/ws/a/b', 400],
    ['/ws/%E0%A4%A', 400],
    [`/ws/${'x'.repeat(65)}`, 400],
    ['/other/abc', 404],
    ['/ws', 404],
    [undefined, 404]
  ])('rejects %s with %s', (url, status) => {
    expect(parseClientId(url)).toEqual({ ok: false, status })
  })

  it('honors a custom prefix', () => {
    expect(parseClientId('/voice/abc', '/voice/')).toEqual({ ok: true, clientId: 'abc' })
  })
})

describe('RelayWebSocketServer', () => {
  let http: Server
  let relay: RelayWebSocketServer
  let base: string
  let frames: InboundFrame[]
  let closes: string[]

  beforeEach(async () => {
    frames = []
    closes = []
    http = createServer((_req, res) => {
      res.statusCode = 404
      res.end()
    })
    relay = new RelayWebSocketServer({}, {
      onConnection: (ws) => {
        ws.send('welcome')
      },
      onMessage: (_ws, _clientId, frame) => {
        frames.push(frame)
      },
      onClose: (_ws, clientId) => {
        closes.push(clientId)
      }
    })
    relay.attach(http)

    await new Promise<void>(resolve => http.listen(0, '127.0.0.1', () => resolve()))
    const address = http.address()
    if (!address || typeof address === 'string') {
      throw new Error('expected a TCP address')
    }
    base = `ws://127.0.0.1:${address.port}`
  })

  afterEach(async () => {
    await relay.stop()
    http.closeAllConnections()
    await new Promise<void>(resolve => http.close(() => resolve()))
  })

  function open(path: string): Promise<WebSocket> {
    const ws = new WebSocket(`${base}${path}`)
    return new Promise((resolve, reject) => {
      ws.once('message', () => resolve(ws))
      ws.once('error', reject)
    })
  }

  it('splits text and binary frames', async () => {
    const ws = await open('/ws/client-1')
    expect(relay.connectionCount).toBe(1)

    ws.send('{"type":"stop"}')
    ws.send(Buffer.from([1, 2, 3]))

    await vi.waitFor(() => expect(frames).toHaveLength(2))
    expect(frames[0]).toEqual({ type: 'text', message: '{"type":"stop"}' })
    expect(frames[1]).toEqual({ type: 'audio', data: Buffer.from([1, 2, 3]) })
    ws.close()
  })

  it('reports closes with the client id', async () => {
    const ws = await open('/ws/client-2')
    ws.close()

    await vi.waitFor(() => expect(closes).toEqual(['client-2']))
    expect(relay.connectionCount).toBe(0)
  })

  it('rejects upgrades outside the prefix or with a bad id', async () => {
    const status = (path: string) =>
      new Promise<number | undefined>(resolve => {
        const ws = new WebSocket(`${base}${path}`)
        ws.on('unexpected-response', (_req, res) => {
          resolve(res.statusCode)
          ws.terminate()
        })
        ws.on('error', () => resolve(undefined))
      })

    expect(await status('/elsewhere/abc')).toBe(404)
    expect(await status('/ws/bad%20id')).toBe(400)
  })
})
