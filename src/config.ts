import { ConfigError } from './core/errors.js'
import type { RealtimeUpstreamConfig } from './core/upstream.js'
import type { VoiceServerConfig } from './index.js'

/**
 * Map environment variables onto a server configuration
 *
 * PORT, HOST, STATIC_DIR, VERBOSE, OPENAI_API_KEY, OPENAI_REALTIME_URL,
 * OPENAI_REALTIME_MODEL, UPSTREAM_IDLE_TIMEOUT_MS
 *
 * @throws ConfigError for malformed numbers
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): VoiceServerConfig {
  const config: VoiceServerConfig = {
    http: {
      port: readInteger(env, 'PORT') ?? 8000,
      host: env.HOST || '0.0.0.0'
    },
    verbose: readBoolean(env, 'VERBOSE')
  }

  if (env.STATIC_DIR) {
    config.http.staticDir = env.STATIC_DIR
  }

  const upstream: RealtimeUpstreamConfig = {}
  if (env.OPENAI_API_KEY) {
    upstream.apiKey = env.OPENAI_API_KEY
  }
  if (env.OPENAI_REALTIME_URL) {
    upstream.url = env.OPENAI_REALTIME_URL
  }
  if (env.OPENAI_REALTIME_MODEL) {
    upstream.model = env.OPENAI_REALTIME_MODEL
  }
  config.upstream = upstream

  const idleTimeoutMs = readInteger(env, 'UPSTREAM_IDLE_TIMEOUT_MS')
  if (idleTimeoutMs !== undefined) {
    config.registry = { idleTimeoutMs }
  }

  return config
}

function readInteger(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw === '') {
    return undefined
  }

  const value = Number(raw)
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`)
  }
  return value
}

function readBoolean(env: NodeJS.ProcessEnv, name: string): boolean {
  const raw = env[name]?.toLowerCase()
  return raw === '1' || raw === 'true' || raw === 'yes'
}
