import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { BinarySink } from './chunk-relay.js'
import { CaptureBridge } from './capture-bridge.js'

interface FakePort {
  onmessage: ((event: { data: unknown }) => void) | null
  postMessage: (message: unknown) => void
}

/**
 * Minimal Web Audio graph: records what the bridge builds and lets tests
 * play the worklet's side of the port
 */
class FakeWorkletNode {
  static instances: FakeWorkletNode[] = []
  /** What the worklet answers to STOP; null leaves it unanswered */
  static stopReply: ArrayBuffer | null = null

  readonly port: FakePort
  readonly controls: unknown[] = []
  disconnect = vi.fn()
  onprocessorerror: (() => void) | null = null

  constructor(readonly context: unknown, readonly name: string, readonly options: unknown) {
    this.port = {
      onmessage: null,
      postMessage: (message) => {
        this.controls.push(message)
        const reply = FakeWorkletNode.stopReply
        if (message === 'STOP' && reply) {
          this.emit({ type: 'audio_data', data: reply })
          this.emit({ type: 'stopped' })
        }
      }
    }
    FakeWorkletNode.instances.push(this)
  }

  emit(data: unknown): void {
    this.port.onmessage?.({ data })
  }
}

class FakeAudioContext {
  static instances: FakeAudioContext[] = []

  readonly audioWorklet = { addModule: vi.fn(async (_url: string) => {}) }
  readonly source = { connect: vi.fn(), disconnect: vi.fn() }
  close = vi.fn(async () => {})

  constructor(readonly options: unknown) {
    FakeAudioContext.instances.push(this)
  }

  createMediaStreamSource() {
    return this.source
  }
}

class FakeSink implements BinarySink {
  readyState = 1
  bufferedAmount = 0
  sent: ArrayBuffer[] = []

  send(data: ArrayBuffer): void {
    this.sent.push(data)
  }
}

describe('CaptureBridge', () => {
  const track = { stop: vi.fn() }
  const getUserMedia = vi.fn(async () => ({ getTracks: () => [track] }))

  beforeEach(() => {
    FakeWorkletNode.instances = []
    FakeWorkletNode.stopReply = null
    FakeAudioContext.instances = []
    track.stop.mockClear()
    vi.stubGlobal('navigator', { mediaDevices: { getUserMedia } })
    vi.stubGlobal('AudioContext', FakeAudioContext)
    vi.stubGlobal('AudioWorkletNode', FakeWorkletNode)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('builds the capture graph and arms the encoder', async () => {
    const bridge = new CaptureBridge(new FakeSink(), { workletUrl: '/pcm-worklet.js', chunkBytes: 960 })
    await bridge.start()

    const [context] = FakeAudioContext.instances
    const [node] = FakeWorkletNode.instances
    expect(bridge.isCapturing).toBe(true)
    expect(context.options).toEqual({ sampleRate: 24000 })
    expect(context.audioWorklet.addModule).toHaveBeenCalledWith('/pcm-worklet.js')
    expect(node.name).toBe('pcm16-encoder')
    expect(node.options).toMatchObject({ processorOptions: { chunkBytes: 960 } })
    expect(context.source.connect).toHaveBeenCalledWith(node)
    expect(node.controls).toEqual(['START'])
  })

  it('starts only once when called concurrently', async () => {
    const bridge = new CaptureBridge(new FakeSink(), { workletUrl: '/w.js' })
    await Promise.all([bridge.start(), bridge.start()])
    expect(FakeWorkletNode.instances).toHaveLength(1)
  })

  it('relays encoded chunks to the sink', async () => {
    const sink = new FakeSink()
    const bridge = new CaptureBridge(sink, { workletUrl: '/w.js' })
    await bridge.start()

    const chunk = new ArrayBuffer(4)
    FakeWorkletNode.instances[0].emit({ type: 'audio_data', data: chunk })
    FakeWorkletNode.instances[0].emit({ type: 'something_else' })

    expect(sink.sent).toEqual([chunk])
    expect(bridge.getStats()).toEqual({ sent: 1, dropped: 0 })
  })

  it('waits for the final flush before releasing the device', async () => {
    const sink = new FakeSink()
    const bridge = new CaptureBridge(sink, { workletUrl: '/w.js' })
    await bridge.start()

    const tail = new ArrayBuffer(2)
    FakeWorkletNode.stopReply = tail
    await bridge.stop()

    const [context] = FakeAudioContext.instances
    expect(sink.sent).toEqual([tail])
    expect(FakeWorkletNode.instances[0].controls).toEqual(['START', 'STOP'])
    expect(track.stop).toHaveBeenCalledTimes(1)
    expect(context.close).toHaveBeenCalledTimes(1)
    expect(bridge.isCapturing).toBe(false)
  })

  it('gives up on the flush after the stop timeout', async () => {
    const bridge = new CaptureBridge(new FakeSink(), { workletUrl: '/w.js', stopTimeoutMs: 5 })
    await bridge.start()

    await bridge.stop()

    expect(FakeAudioContext.instances[0].close).toHaveBeenCalledTimes(1)
    expect(bridge.isCapturing).toBe(false)
  })

  it('releases the microphone when the worklet fails to load', async () => {
    const bridge = new CaptureBridge(new FakeSink(), { workletUrl: '/missing.js' })
    const failing = vi.fn(async (_url: string): Promise<void> => {
      throw new Error('404')
    })
    vi.stubGlobal(
      'AudioContext',
      class extends FakeAudioContext {
        readonly audioWorklet = { addModule: failing }
      }
    )

    await expect(bridge.start()).rejects.toThrow('404')
    expect(track.stop).toHaveBeenCalledTimes(1)
    expect(bridge.isCapturing).toBe(false)
  })

  it.each([1001, 0, -2, 2.5])('rejects a chunk size of %s', (chunkBytes) => {
    expect(() => new CaptureBridge(new FakeSink(), { workletUrl: '/w.js', chunkBytes })).toThrow(RangeError)
  })

  it('releases the microphone and context when the worklet node cannot be created', async () => {
    const bridge = new CaptureBridge(new FakeSink(), { workletUrl: '/w.js' })
    vi.stubGlobal(
      'AudioWorkletNode',
      class {
        constructor() {
          throw new Error('processor not registered')
        }
      }
    )

    await expect(bridge.start()).rejects.toThrow('processor not registered')
    expect(track.stop).toHaveBeenCalledTimes(1)
    expect(FakeAudioContext.instances[0].close).toHaveBeenCalledTimes(1)
    expect(bridge.isCapturing).toBe(false)
  })

  it('does not wait for a flush from a crashed worklet', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const bridge = new CaptureBridge(new FakeSink(), { workletUrl: '/w.js', stopTimeoutMs: 60_000 })
    await bridge.start()

    FakeWorkletNode.instances[0].onprocessorerror?.()
    await bridge.stop()

    expect(error).toHaveBeenCalledWith('Encoder worklet failed; no more audio will be captured')
    expect(FakeAudioContext.instances[0].close).toHaveBeenCalledTimes(1)
    error.mockRestore()
  })
})
