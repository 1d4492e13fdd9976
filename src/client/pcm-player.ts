import { DEFAULT_SAMPLE_RATE, decodePcm16 } from '../core/pcm.js'

export interface PcmPlayerConfig {
  /** Rate of the incoming PCM16 audio (default: 24000) */
  sampleRate?: number
  /** Initial volume, 0..1 (default: 1) */
  volume?: number
}

/**
 * Gapless playback of relayed PCM16 chunks
 * Each chunk is scheduled right after the previous one
 */
export class PcmPlayer {
  private config: Required<PcmPlayerConfig>
  private context: AudioContext | null = null
  private gain: GainNode | null = null
  private sources: Set<AudioBufferSourceNode> = new Set()
  private nextStartTime = 0
  private muted = false

  constructor(config: PcmPlayerConfig = {}) {
    this.config = {
      sampleRate: DEFAULT_SAMPLE_RATE,
      volume: 1,
      ...config
    }
  }

  /**
   * Queue one chunk for playback
   */
  async enqueue(chunk: Uint8Array): Promise<void> {
    const samples = decodePcm16(chunk)
    if (samples.length === 0) {
      return
    }

    const { context, gain } = this.ensureContext()
    if (context.state === 'suspended') {
      await context.resume()
    }

    const buffer = context.createBuffer(1, samples.length, this.config.sampleRate)
    buffer.getChannelData(0).set(samples)

    const source = context.createBufferSource()
    source.buffer = buffer
    source.connect(gain)
    source.addEventListener('ended', () => {
      this.sources.delete(source)
    })

    this.nextStartTime = Math.max(this.nextStartTime, context.currentTime)
    source.start(this.nextStartTime)
    this.nextStartTime += buffer.duration
    this.sources.add(source)
  }

  setVolume(volume: number): void {
    this.config.volume = Math.max(0, Math.min(1, volume))
    this.applyGain()
  }

  setMuted(muted: boolean): void {
    this.muted = muted
    this.applyGain()
  }

  /**
   * Cancel everything scheduled
   */
  stop(): void {
    for (const source of this.sources) {
      source.stop()
    }
    this.sources.clear()
    this.nextStartTime = 0
  }

  async close(): Promise<void> {
    this.stop()
    if (this.context) {
      await this.context.close()
      this.context = null
      this.gain = null
    }
  }

  private ensureContext(): { context: AudioContext; gain: GainNode } {
    if (this.context && this.gain) {
      return { context: this.context, gain: this.gain }
    }
    const context = new AudioContext({ sampleRate: this.config.sampleRate })
    const gain = context.createGain()
    gain.connect(context.destination)
    this.context = context
    this.gain = gain
    this.applyGain()
    return { context, gain }
  }

  private applyGain(): void {
    if (this.gain) {
      this.gain.gain.value = this.muted ? 0 : this.config.volume
    }
  }
}
