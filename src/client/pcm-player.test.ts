import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { encodePcm16 } from '../core/pcm.js'
import { PcmPlayer } from './pcm-player.js'

class FakeSource {
  buffer: { duration: number; data: Float32Array } | null = null
  connect = vi.fn()
  start = vi.fn()
  stop = vi.fn()
  addEventListener = vi.fn()
}

class FakeContext {
  static instances: FakeContext[] = []

  state = 'running'
  currentTime = 0
  destination = {}
  sources: FakeSource[] = []
  gain = { gain: { value: 1 }, connect: vi.fn() }
  resume = vi.fn(async () => {})
  close = vi.fn(async () => {})

  constructor(readonly options: { sampleRate: number }) {
    FakeContext.instances.push(this)
  }

  createGain() {
    return this.gain
  }

  createBuffer(_channels: number, length: number, sampleRate: number) {
    const data = new Float32Array(length)
    return { duration: length / sampleRate, data, getChannelData: () => data }
  }

  createBufferSource() {
    const source = new FakeSource()
    this.sources.push(source)
    return source
  }
}

describe('PcmPlayer', () => {
  beforeEach(() => {
    FakeContext.instances = []
    vi.stubGlobal('AudioContext', FakeContext)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('schedules chunks back to back', async () => {
    const player = new PcmPlayer({ sampleRate: 1000 })

    await player.enqueue(encodePcm16(new Float32Array(500)))
    await player.enqueue(encodePcm16(new Float32Array(250)))

    const [context] = FakeContext.instances
    expect(context.options).toEqual({ sampleRate: 1000 })
    expect(context.sources.map(s => s.start.mock.calls[0][0])).toEqual([0, 0.5])
  })

  it('restarts from the current time after a gap', async () => {
    const player = new PcmPlayer({ sampleRate: 1000 })
    await player.enqueue(encodePcm16(new Float32Array(100)))

    const [context] = FakeContext.instances
    context.currentTime = 2
    await player.enqueue(encodePcm16(new Float32Array(100)))

    expect(context.sources[1].start).toHaveBeenCalledWith(2)
  })

  it('decodes samples into the audio buffer', async () => {
    const player = new PcmPlayer()
    await player.enqueue(encodePcm16([1, -1]))

    const source = FakeContext.instances[0].sources[0]
    expect(source.buffer?.data).toEqual(new Float32Array([1, -1]))
  })

  it('ignores empty chunks', async () => {
    const player = new PcmPlayer()
    await player.enqueue(new Uint8Array(1))
    expect(FakeContext.instances).toHaveLength(0)
  })

  it('applies volume and mute to the gain node', async () => {
    const player = new PcmPlayer({ volume: 0.5 })
    await player.enqueue(encodePcm16([0]))
    const { gain } = FakeContext.instances[0]

    expect(gain.gain.value).toBe(0.5)
    player.setMuted(true)
    expect(gain.gain.value).toBe(0)
    player.setMuted(false)
    player.setVolume(3)
    expect(gain.gain.value).toBe(1)
  })

  it('stops scheduled sources and closes the context', async () => {
    const player = new PcmPlayer()
    await player.enqueue(encodePcm16([0.1]))
    const context = FakeContext.instances[0]

    await player.close()

    expect(context.sources[0].stop).toHaveBeenCalledTimes(1)
    expect(context.close).toHaveBeenCalledTimes(1)
  })
})
