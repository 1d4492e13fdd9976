/**
 * Capture bridge
 *
 * Owns the microphone stream and the encoder worklet node, relays encoded
 * chunks onto the socket and forwards start/stop intents into the encoder.
 */

import { createEncoderState } from '../core/encoder.js'
import { DEFAULT_CHUNK_BYTES, DEFAULT_SAMPLE_RATE } from '../core/pcm.js'
import { ChunkRelay, type BinarySink, type ChunkRelayConfig } from './chunk-relay.js'
import { PCM16_PROCESSOR_NAME, isWorkletMessage, type Pcm16ProcessorOptions } from './worklet-protocol.js'

export interface CaptureBridgeConfig extends ChunkRelayConfig {
  /** URL of the compiled pcm-worklet module */
  workletUrl: string
  /** Capture rate; the AudioContext resamples the device to it (default: 24000) */
  sampleRate?: number
  /** Bytes per emitted chunk, a positive even integer (default: 1s of audio) */
  chunkBytes?: number
  /** How long stop() waits for the final flush (default: 1000ms) */
  stopTimeoutMs?: number
}

interface CaptureGraph {
  context: AudioContext
  stream: MediaStream
  source: MediaStreamAudioSourceNode
  node: AudioWorkletNode
  /** Resolves when the worklet confirms its final flush */
  stopped: Promise<void>
}

export class CaptureBridge {
  private config: Required<Omit<CaptureBridgeConfig, keyof ChunkRelayConfig>>
  private relay: ChunkRelay
  private graph: CaptureGraph | null = null
  private starting: Promise<void> | null = null

  /**
   * @throws RangeError if `chunkBytes` is not a positive even integer
   */
  constructor(sink: BinarySink | null, config: CaptureBridgeConfig) {
    const { maxBufferedBytes, ...rest } = config
    this.config = {
      sampleRate: DEFAULT_SAMPLE_RATE,
      chunkBytes: DEFAULT_CHUNK_BYTES,
      stopTimeoutMs: 1000,
      ...rest
    }
    // The worklet builds its encoder from chunkBytes; fail here rather than on the audio thread
    createEncoderState(this.config.chunkBytes)
    this.relay = new ChunkRelay(sink, maxBufferedBytes === undefined ? {} : { maxBufferedBytes })
  }

  get isCapturing(): boolean {
    return this.graph !== null
  }

  /**
   * Switch the outbound socket, e.g. after a reconnect
   */
  attach(sink: BinarySink | null): void {
    this.relay.attach(sink)
  }

  getStats(): { sent: number; dropped: number } {
    return this.relay.getStats()
  }

  /**
   * Open the microphone and begin encoding
   */
  async start(): Promise<void> {
    if (this.graph) {
      return
    }
    if (!this.starting) {
      this.starting = this.open().finally(() => {
        this.starting = null
      })
    }
    await this.starting
  }

  /**
   * Stop encoding, relay the final partial chunk and release the device
   */
  async stop(): Promise<void> {
    if (this.starting) {
      await this.starting
    }

    const graph = this.graph
    if (!graph) {
      return
    }
    this.graph = null

    graph.node.port.postMessage('STOP')
    await Promise.race([
      graph.stopped,
      new Promise<void>(resolve => setTimeout(resolve, this.config.stopTimeoutMs))
    ])

    graph.source.disconnect()
    graph.node.disconnect()
    graph.node.port.onmessage = null
    graph.stream.getTracks().forEach(track => track.stop())
    await graph.context.close()
  }

  private async open(): Promise<void> {
    const stream = await navigator.mediaDevices.getUserMedia({
      audio: {
        channelCount: 1,
        sampleRate: this.config.sampleRate,
        echoCancellation: true,
        noiseSuppression: true,
        autoGainControl: true
      }
    })

    let context: AudioContext | null = null

    try {
      context = new AudioContext({ sampleRate: this.config.sampleRate })
      await context.audioWorklet.addModule(this.config.workletUrl)
      this.graph = this.buildGraph(context, stream)
    } catch (error) {
      stream.getTracks().forEach(track => track.stop())
      if (context) {
        await context.close()
      }
      throw error
    }
  }

  private buildGraph(context: AudioContext, stream: MediaStream): CaptureGraph {
    const processorOptions: Pcm16ProcessorOptions = { chunkBytes: this.config.chunkBytes }
    const node = new AudioWorkletNode(context, PCM16_PROCESSOR_NAME, {
      numberOfInputs: 1,
      numberOfOutputs: 0,
      channelCount: 1,
      channelCountMode: 'explicit',
      processorOptions
    })

    let acknowledgeStop: () => void = () => {}
    const stopped = new Promise<void>(resolve => {
      acknowledgeStop = resolve
    })

    node.port.onmessage = (event: MessageEvent<unknown>) => {
      const message = event.data
      if (!isWorkletMessage(message)) {
        return
      }
      if (message.type === 'audio_data') {
        this.relay.push(message.data)
      } else {
        acknowledgeStop()
      }
    }

    // A crashed processor never acknowledges STOP
    node.onprocessorerror = () => {
      console.error('Encoder worklet failed; no more audio will be captured')
      acknowledgeStop()
    }

    const source = context.createMediaStreamSource(stream)
    source.connect(node)
    node.port.postMessage('START')

    return { context, stream, source, node, stopped }
  }
}
