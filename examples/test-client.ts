/**
 * Test WebSocket client for persona-voice-relay
 *
 * Selects a persona, sends a chat message, streams one second of a test
 * tone and ends the turn.
 */

import WebSocket from 'ws'
import { DEFAULT_CHUNK_BYTES, DEFAULT_SAMPLE_RATE, createEncoderState, encodeStep } from '../src/index.js'

const WS_URL = process.env.RELAY_URL ?? 'ws://localhost:8000/ws/test-client'
const PERSONA = process.env.PERSONA ?? 'astrologer'

console.log('Starting WebSocket client test...\n')
console.log(`Connecting to: ${WS_URL}`)

const ws = new WebSocket(WS_URL)

/**
 * One second of a 440Hz tone, encoded the way the browser worklet does it
 */
function toneChunks(): Uint8Array[] {
  const blockSize = 128
  const chunks: Uint8Array[] = []
  let state = encodeStep(createEncoderState(DEFAULT_CHUNK_BYTES / 10), null, 'START').state

  for (let offset = 0; offset < DEFAULT_SAMPLE_RATE; offset += blockSize) {
    const block = new Float32Array(blockSize)
    for (let i = 0; i < blockSize; i++) {
      block[i] = 0.3 * Math.sin((2 * Math.PI * 440 * (offset + i)) / DEFAULT_SAMPLE_RATE)
    }
    const step = encodeStep(state, block)
    state = step.state
    chunks.push(...step.chunks)
  }

  chunks.push(...encodeStep(state, null, 'STOP').chunks)
  return chunks
}

ws.on('open', () => {
  console.log('✓ Connected to server\n')

  console.log(`1. Selecting persona "${PERSONA}"`)
  ws.send(JSON.stringify({ type: 'select_persona', persona_id: PERSONA }))

  setTimeout(() => {
    console.log('2. Sending chat message')
    ws.send(JSON.stringify({ type: 'chat_message', message: 'Hi there!' }))
  }, 1000)

  setTimeout(() => {
    const chunks = toneChunks()
    console.log(`3. Streaming ${chunks.length} audio chunks`)
    for (const chunk of chunks) {
      ws.send(chunk)
    }
    ws.send(JSON.stringify({ type: 'stop' }))
  }, 2000)

  // Close connection after tests
  setTimeout(() => {
    console.log('\n✓ All tests completed')
    console.log('Closing connection...')
    ws.close()
  }, 8000)
})

ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
  if (isBinary) {
    const length = Buffer.isBuffer(data) ? data.length : Array.isArray(data) ? Buffer.concat(data).length : data.byteLength
    console.log(`← Server audio: ${length} bytes`)
    return
  }
  console.log('← Server message:', data.toString())
})

ws.on('error', (error) => {
  console.error('✗ WebSocket error:', error.message)
})

ws.on('close', (code) => {
  console.log(`Connection closed (${code})`)
})
