/** Name the encoder processor registers under */
export const PCM16_PROCESSOR_NAME = 'pcm16-encoder'

/**
 * Messages posted from the worklet to the main thread
 */
export type WorkletMessage =
  | { type: 'audio_data'; data: ArrayBuffer }
  | { type: 'stopped' }

/**
 * `processorOptions` accepted by the encoder processor
 */
export interface Pcm16ProcessorOptions {
  /** Emission threshold in bytes (default: 1s at 24kHz) */
  chunkBytes?: number
}

export function isWorkletMessage(value: unknown): value is WorkletMessage {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false
  }
  if (value.type === 'stopped') {
    return true
  }
  return value.type === 'audio_data' && 'data' in value && value.data instanceof ArrayBuffer
}
