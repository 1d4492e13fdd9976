/**
 * Voice profile applied to the upstream speech session
 */
export interface VoiceProfile {
  /** Upstream voice name (e.g. "nova", "alloy") */
  voice: string
  /** Sampling temperature for responses */
  temperature: number
}

/**
 * Presentation data for persona pickers
 */
export interface PersonaDisplayMeta {
  description: string
  /** CSS color, e.g. "#FFD700" */
  color: string
  icon: string
}

/**
 * Persona behavior profile
 * Owned by the catalog and referenced by sessions, never copied
 */
export interface Persona {
  readonly id: string
  readonly name: string
  /** System instructions sent to the upstream session */
  readonly prompt: string
  readonly voiceProfile: Readonly<VoiceProfile>
  readonly displayMeta: Readonly<PersonaDisplayMeta>
  /** First line spoken when an upstream session opens */
  readonly greeting: string
}

/**
 * Public persona shape sent to clients (no prompt text)
 */
export interface PersonaView {
  id: string
  name: string
  description: string
  color: string
  icon: string
  voice: string
}

/**
 * Connection session lifecycle
 */
export type ConnectionState = 'idle' | 'persona_selected' | 'streaming' | 'closed'

/**
 * Client → server control messages (JSON text frames)
 */
export type ControlMessage =
  | { type: 'select_persona'; persona_id: string }
  | { type: 'chat_message'; message: string }
  | { type: 'stop' }

/**
 * Server → client events
 * `audio_chunk` travels as a binary frame, everything else as JSON
 */
export type RelayEvent =
  | { type: 'persona_selected'; persona: PersonaView; message: string }
  | { type: 'ai_response'; message: string; timestamp: string }
  | { type: 'audio_chunk'; data: Uint8Array }
  | { type: 'audio_done'; timestamp: string }
  | { type: 'error'; message: string }

/**
 * Inbound socket frame, distinguished by frame type
 */
export type InboundFrame =
  | { type: 'text'; message: string }
  | { type: 'audio'; data: Buffer }
