import { BYTES_PER_SAMPLE, DEFAULT_CHUNK_BYTES, writePcm16 } from './pcm.js'

export type EncoderControl = 'START' | 'STOP'

export type EncoderStatus = 'idle' | 'recording' | 'stopped'

/**
 * Encoder state
 * Treated as immutable: segments already in a state are never written again
 */
export interface EncoderState {
  /** Emission threshold in bytes */
  readonly threshold: number
  readonly status: EncoderStatus
  /** Buffered PCM16 bytes not yet emitted, in order */
  readonly segments: readonly Uint8Array[]
  /** Total buffered bytes */
  readonly length: number
}

export interface EncoderStep {
  state: EncoderState
  /** Chunks emitted by this step, in order */
  chunks: Uint8Array[]
}

/**
 * Create an idle encoder
 * @param threshold Bytes per emitted chunk; must be a positive even integer
 */
export function createEncoderState(threshold: number = DEFAULT_CHUNK_BYTES): EncoderState {
  if (!Number.isInteger(threshold) || threshold <= 0 || threshold % BYTES_PER_SAMPLE !== 0) {
    throw new RangeError(`Encoder threshold must be a positive even integer, got ${threshold}`)
  }

  return { threshold, status: 'idle', segments: [], length: 0 }
}

/**
 * Advance the encoder by one processing cycle
 *
 * With a control signal the block is ignored: START arms an idle encoder,
 * STOP flushes whatever is buffered as a final chunk and stops for good.
 * Without one, a recording encoder converts the block to PCM16 and emits a
 * chunk every time the buffer reaches the threshold.
 */
export function encodeStep(
  state: EncoderState,
  block: ArrayLike<number> | null,
  control?: EncoderControl
): EncoderStep {
  if (control === 'START') {
    if (state.status !== 'idle') {
      return { state, chunks: [] }
    }
    return { state: { ...state, status: 'recording' }, chunks: [] }
  }

  if (control === 'STOP') {
    const chunks = state.length > 0 ? [concatSegments(state.segments, state.length)] : []
    return {
      state: { threshold: state.threshold, status: 'stopped', segments: [], length: 0 },
      chunks
    }
  }

  if (state.status !== 'recording' || !block || block.length === 0) {
    return { state, chunks: [] }
  }

  const chunks: Uint8Array[] = []
  let segments = state.segments.slice()
  let length = state.length

  let current = new Uint8Array(Math.min(block.length * BYTES_PER_SAMPLE, state.threshold - length))
  let written = 0

  for (let i = 0; i < block.length; i++) {
    writePcm16(current, written, block[i])
    written += BYTES_PER_SAMPLE
    length += BYTES_PER_SAMPLE

    if (length >= state.threshold) {
      segments.push(current.subarray(0, written))
      chunks.push(concatSegments(segments, length))
      segments = []
      length = 0

      const remaining = (block.length - i - 1) * BYTES_PER_SAMPLE
      current = new Uint8Array(Math.min(remaining, state.threshold))
      written = 0
    }
  }

  if (written > 0) {
    segments.push(current.subarray(0, written))
  }

  return {
    state: { threshold: state.threshold, status: state.status, segments, length },
    chunks
  }
}

function concatSegments(segments: readonly Uint8Array[], length: number): Uint8Array {
  const out = new Uint8Array(length)
  let offset = 0
  for (const segment of segments) {
    out.set(segment, offset)
    offset += segment.length
  }
  return out
}
