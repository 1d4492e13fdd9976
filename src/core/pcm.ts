/** Nominal capture/playback rate; the upstream speaks PCM16 at 24kHz */
export const DEFAULT_SAMPLE_RATE = 24000

/** Mono 16-bit */
export const BYTES_PER_SAMPLE = 2

/** One second of audio at the nominal rate */
export const DEFAULT_CHUNK_BYTES = DEFAULT_SAMPLE_RATE * BYTES_PER_SAMPLE

/**
 * Convert a float sample to a signed 16-bit integer
 * Clamps to [-1, 1] first; negative values scale by 32768, the rest by 32767
 * @param sample Float sample, possibly out of range or NaN
 * @returns Integer in [-32768, 32767]
 */
export function floatToPcm16(sample: number): number {
  const clamped = Math.max(-1, Math.min(1, sample))
  if (Number.isNaN(clamped)) {
    return 0
  }
  return Math.trunc(clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff)
}

/**
 * Inverse of floatToPcm16
 */
export function pcm16ToFloat(value: number): number {
  return value < 0 ? value / 0x8000 : value / 0x7fff
}

/**
 * Write one sample as little-endian PCM16 into `target` at `offset`
 */
export function writePcm16(target: Uint8Array, offset: number, sample: number): void {
  const value = floatToPcm16(sample)
  target[offset] = value & 0xff
  target[offset + 1] = (value >> 8) & 0xff
}

/**
 * Encode a block of float samples to little-endian PCM16 bytes
 */
export function encodePcm16(samples: ArrayLike<number>): Uint8Array {
  const out = new Uint8Array(samples.length * BYTES_PER_SAMPLE)
  for (let i = 0; i < samples.length; i++) {
    writePcm16(out, i * BYTES_PER_SAMPLE, samples[i])
  }
  return out
}

/**
 * Decode little-endian PCM16 bytes to normalized floats
 * A trailing odd byte is ignored
 */
export function decodePcm16(bytes: Uint8Array): Float32Array {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const count = Math.floor(bytes.byteLength / BYTES_PER_SAMPLE)
  const out = new Float32Array(count)

  for (let i = 0; i < count; i++) {
    out[i] = pcm16ToFloat(view.getInt16(i * BYTES_PER_SAMPLE, true))
  }

  return out
}
