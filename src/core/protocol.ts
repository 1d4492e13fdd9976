import type { ControlMessage, RelayEvent } from '../types/index.js'
import { ProtocolError } from './errors.js'
import { parseJsonObject, readString } from './json.js'

/**
 * Parse a JSON text frame into a control message
 * @throws ProtocolError for invalid JSON, unknown types or missing fields
 */
export function parseControlMessage(text: string): ControlMessage {
  const value = parseJsonObject(text)
  if (!value) {
    throw new ProtocolError('Invalid message: expected a JSON object')
  }

  const type = readString(value, 'type')
  switch (type) {
    case 'select_persona': {
      const personaId = readString(value, 'persona_id')
      if (!personaId) {
        throw new ProtocolError('select_persona requires a non-empty "persona_id"')
      }
      return { type, persona_id: personaId }
    }
    case 'chat_message': {
      const message = readString(value, 'message')
      if (message === null || message.trim() === '') {
        throw new ProtocolError('chat_message requires a non-empty "message"')
      }
      return { type, message }
    }
    case 'stop':
      return { type }
    case null:
      throw new ProtocolError('Invalid message: missing "type"')
    default:
      throw new ProtocolError(`Unknown message type: ${type}`)
  }
}

/**
 * Serialize a relay event for the client socket
 * Audio goes out as a binary frame, everything else as JSON text
 */
export function encodeRelayEvent(event: RelayEvent): string | Buffer {
  if (event.type === 'audio_chunk') {
    return Buffer.from(event.data.buffer, event.data.byteOffset, event.data.byteLength)
  }
  return JSON.stringify(event)
}

export function timestamp(date: Date = new Date()): string {
  return date.toISOString()
}
