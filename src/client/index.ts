/**
 * Browser entry point
 * The worklet module (pcm-worklet.js) is loaded separately by URL
 */

export * from './capture-bridge.js'
export * from './chunk-relay.js'
export * from './pcm-player.js'
export * from './voice-client.js'
export * from './worklet-protocol.js'
export { createEncoderState, encodeStep } from '../core/encoder.js'
export type { EncoderControl, EncoderState, EncoderStep } from '../core/encoder.js'
export { decodePcm16, encodePcm16, DEFAULT_CHUNK_BYTES, DEFAULT_SAMPLE_RATE } from '../core/pcm.js'
