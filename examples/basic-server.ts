/**
 * Basic persona-voice-relay example
 *
 * Starts the relay with settings from the environment. Without
 * OPENAI_API_KEY every persona answers from its fallback script.
 *
 *   OPENAI_API_KEY=... PORT=8000 STATIC_DIR=./public npm run example
 */

import { VoiceServer, loadConfigFromEnv } from '../src/index.js'

const config = loadConfigFromEnv()
const server = new VoiceServer(config)

const port = await server.start()

console.log('Voice relay is running...')
console.log(`- Personas: http://localhost:${port}/api/personas`)
console.log(`- Stats:    http://localhost:${port}/api/stats`)
console.log(`- WebSocket: ws://localhost:${port}/ws/<clientId>`)
console.log('- Press Ctrl+C to stop')

// Graceful shutdown
process.on('SIGINT', async () => {
  console.log('\nShutting down...')
  await server.stop()
  process.exit(0)
})
