/**
 * AudioWorklet processor: float32 microphone blocks → PCM16 chunks
 *
 * Runs on the audio rendering thread. All encoding is delegated to the pure
 * encoder; this shell only moves messages across the port.
 */

import { createEncoderState, encodeStep, type EncoderControl, type EncoderState, type EncoderStep } from '../core/encoder.js'
import { DEFAULT_CHUNK_BYTES } from '../core/pcm.js'
import { PCM16_PROCESSOR_NAME, type Pcm16ProcessorOptions, type WorkletMessage } from './worklet-protocol.js'

// AudioWorkletGlobalScope is not part of the DOM lib
declare class AudioWorkletProcessor {
  readonly port: MessagePort
  constructor(options?: AudioWorkletNodeOptions)
}

declare function registerProcessor(
  name: string,
  processorCtor: new (options?: AudioWorkletNodeOptions) => AudioWorkletProcessor
): void

function isControl(value: unknown): value is EncoderControl {
  return value === 'START' || value === 'STOP'
}

class Pcm16EncoderProcessor extends AudioWorkletProcessor {
  private state: EncoderState

  constructor(options?: AudioWorkletNodeOptions) {
    super(options)
    const processorOptions: Pcm16ProcessorOptions = options?.processorOptions ?? {}
    this.state = createEncoderState(processorOptions.chunkBytes ?? DEFAULT_CHUNK_BYTES)

    this.port.onmessage = (event: MessageEvent<unknown>) => {
      if (!isControl(event.data)) {
        return
      }
      const wasStopped = this.state.status === 'stopped'
      this.apply(encodeStep(this.state, null, event.data))
      if (event.data === 'STOP' && !wasStopped) {
        this.post({ type: 'stopped' })
      }
    }
  }

  process(inputs: Float32Array[][]): boolean {
    // Mono: only the first channel of the first input is encoded
    const channel = inputs[0]?.[0] ?? null
    this.apply(encodeStep(this.state, channel))
    return this.state.status !== 'stopped'
  }

  private apply(step: EncoderStep): void {
    this.state = step.state
    for (const chunk of step.chunks) {
      const data = new ArrayBuffer(chunk.byteLength)
      new Uint8Array(data).set(chunk)
      this.post({ type: 'audio_data', data }, [data])
    }
  }

  private post(message: WorkletMessage, transfer: Transferable[] = []): void {
    this.port.postMessage(message, transfer)
  }
}

registerProcessor(PCM16_PROCESSOR_NAME, Pcm16EncoderProcessor)
