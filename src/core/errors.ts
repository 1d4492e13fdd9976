/**
 * Base class for relay errors
 * `code` is stable and safe to log or match on
 */
export class RelayError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * Malformed or unrecognized control message
 */
export class ProtocolError extends RelayError {
  constructor(message: string) {
    super('protocol_error', message)
  }
}

export class UnknownPersonaError extends RelayError {
  readonly personaId: string

  constructor(personaId: string) {
    super('unknown_persona', `Unknown persona: ${personaId}`)
    this.personaId = personaId
  }
}

/**
 * Speech upstream unreachable or not configured
 */
export class UpstreamUnavailableError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('upstream_unavailable', message, options)
  }
}

/**
 * Operation on a session that has been torn down
 */
export class SessionClosedError extends RelayError {
  constructor(clientId: string) {
    super('session_closed', `Session ${clientId} is closed`)
  }
}

export class ConfigError extends RelayError {
  constructor(message: string) {
    super('config_error', message)
  }
}

/**
 * Describe an unknown thrown value for logs and client messages
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
