import { describe, expect, it } from 'vitest'
import { ProtocolError } from './errors.js'
import { encodeRelayEvent, parseControlMessage, timestamp } from './protocol.js'

describe('parseControlMessage', () => {
  it('parses select_persona', () => {
    expect(parseControlMessage('{"type":"select_persona","persona_id":"astrologer"}')).toEqual({
      type: 'select_persona',
      persona_id: 'astrologer'
    })
  })

  it('parses chat_message and keeps the text as sent', () => {
    expect(parseControlMessage('{"type":"chat_message","message":"  hi "}')).toEqual({
      type: 'chat_message',
      message: '  hi '
    })
  })

  it('parses stop and ignores extra fields', () => {
    expect(parseControlMessage('{"type":"stop","extra":1}')).toEqual({ type: 'stop' })
  })

  it.each([
    ['not json', 'Invalid message: expected a JSON object'],
    ['[1,2]', 'Invalid message: expected a JSON object'],
    ['"select_persona"', 'Invalid message: expected a JSON object'],
    ['{}', 'Invalid message: missing "type"'],
    ['{"type":42}', 'Invalid message: missing "type"'],
    ['{"type":"dance"}', 'Unknown message type: dance'],
    ['{"type":"select_persona"}', 'select_persona requires a non-empty "persona_id"'],
    ['{"type":"select_persona","persona_id":""}', 'select_persona requires a non-empty "persona_id"'],
    ['{"type":"chat_message","message":"   "}', 'chat_message requires a non-empty "message"'],
    ['{"type":"chat_message","message":7}', 'chat_message requires a non-empty "message"']
  ])('rejects %s', (text, message) => {
    expect(() => parseControlMessage(text)).toThrow(ProtocolError)
    expect(() => parseControlMessage(text)).toThrow(message)
  })
})

describe('encodeRelayEvent', () => {
  it('sends audio as raw bytes', () => {
    const backing = new Uint8Array([9, 1, 2, 3])
    const encoded = encodeRelayEvent({ type: 'audio_chunk', data: backing.subarray(1) })

    if (typeof encoded === 'string') {
      throw new Error('expected binary output')
    }
    expect(Array.from(encoded)).toEqual([1, 2, 3])
  })

  it('sends everything else as JSON', () => {
    expect(encodeRelayEvent({ type: 'error', message: 'nope' })).toBe('{"type":"error","message":"nope"}')
  })
})

describe('timestamp', () => {
  it('formats as ISO 8601', () => {
    expect(timestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('2024-01-02T03:04:05.000Z')
  })
})
