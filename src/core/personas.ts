import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import type { Persona, PersonaView } from '../types/index.js'
import { ConfigError, UnknownPersonaError, errorMessage } from './errors.js'
import { readField, readObject, readString } from './json.js'

/** Bundled catalog, resolved from both src/core and dist/core */
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../data/personas.json', import.meta.url))

/**
 * Keyword-triggered canned reply
 */
export interface FallbackRule {
  readonly keywords: readonly string[]
  readonly reply: string
}

/**
 * Canned replies used while the speech upstream is unavailable
 */
export interface FallbackScript {
  readonly rules: readonly FallbackRule[]
  readonly default: string
}

/**
 * Result of a catalog lookup
 */
export type PersonaLookup =
  | { found: true; persona: Persona }
  | { found: false; error: UnknownPersonaError }

interface CatalogEntry {
  persona: Persona
  fallback: FallbackScript
}

/**
 * Static, read-only persona catalog
 */
export class PersonaCatalog {
  private entries: Map<string, CatalogEntry>
  private defaultFallback: string

  constructor(entries: Iterable<CatalogEntry>, defaultFallback: string) {
    this.entries = new Map()
    for (const entry of entries) {
      if (this.entries.has(entry.persona.id)) {
        throw new ConfigError(`Duplicate persona id: ${entry.persona.id}`)
      }
      this.entries.set(entry.persona.id, { persona: Object.freeze(entry.persona), fallback: entry.fallback })
    }
    this.defaultFallback = defaultFallback
  }

  /**
   * Load a catalog from a JSON file
   * @throws ConfigError if the file is missing or malformed
   */
  static fromFile(path: string = DEFAULT_CATALOG_PATH): PersonaCatalog {
    let text: string
    try {
      text = readFileSync(path, 'utf8')
    } catch (error) {
      throw new ConfigError(`Cannot read persona catalog ${path}: ${errorMessage(error)}`)
    }

    let value: unknown
    try {
      value = JSON.parse(text)
    } catch (error) {
      throw new ConfigError(`Persona catalog ${path} is not valid JSON: ${errorMessage(error)}`)
    }

    return PersonaCatalog.fromJson(value)
  }

  static fromJson(value: unknown): PersonaCatalog {
    if (typeof value !== 'object' || value === null) {
      throw new ConfigError('Persona catalog must be an object')
    }

    const list = readField(value, 'personas')
    if (!Array.isArray(list) || list.length === 0) {
      throw new ConfigError('Persona catalog needs a non-empty "personas" array')
    }

    const entries = list.map((item: unknown, index) => parseEntry(item, index))
    const defaultFallback = readString(value, 'defaultFallback') ?? "I'm here to help! How can I assist you today?"
    return new PersonaCatalog(entries, defaultFallback)
  }

  get size(): number {
    return this.entries.size
  }

  /**
   * Find a persona by id
   */
  lookup(personaId: string): PersonaLookup {
    const entry = this.entries.get(personaId)
    if (!entry) {
      return { found: false, error: new UnknownPersonaError(personaId) }
    }
    return { found: true, persona: entry.persona }
  }

  list(): Persona[] {
    return Array.from(this.entries.values(), entry => entry.persona)
  }

  /**
   * Deterministic canned reply for a persona
   * The first rule with a keyword contained in the message wins
   */
  fallbackResponse(personaId: string, message: string): string {
    const entry = this.entries.get(personaId)
    if (!entry) {
      return this.defaultFallback
    }

    const text = message.toLowerCase()
    for (const rule of entry.fallback.rules) {
      if (rule.keywords.some(keyword => text.includes(keyword))) {
        return rule.reply
      }
    }
    return entry.fallback.default
  }
}

/**
 * Public view of a persona (prompt text stays on the server)
 */
export function toPersonaView(persona: Persona): PersonaView {
  return {
    id: persona.id,
    name: persona.name,
    description: persona.displayMeta.description,
    color: persona.displayMeta.color,
    icon: persona.displayMeta.icon,
    voice: persona.voiceProfile.voice
  }
}

function requireString(value: object, key: string, where: string): string {
  const field = readString(value, key)
  if (field === null || field === '') {
    throw new ConfigError(`${where}: "${key}" must be a non-empty string`)
  }
  return field
}

function parseEntry(item: unknown, index: number): CatalogEntry {
  const where = `personas[${index}]`
  if (typeof item !== 'object' || item === null) {
    throw new ConfigError(`${where} must be an object`)
  }

  const temperature = readField(item, 'temperature')
  const persona: Persona = {
    id: requireString(item, 'id', where),
    name: requireString(item, 'name', where),
    prompt: requireString(item, 'prompt', where),
    voiceProfile: {
      voice: requireString(item, 'voice', where),
      temperature: typeof temperature === 'number' ? temperature : 0.8
    },
    displayMeta: {
      description: readString(item, 'description') ?? '',
      color: readString(item, 'color') ?? '#888888',
      icon: readString(item, 'icon') ?? ''
    },
    greeting: readString(item, 'greeting') ?? 'Hello! How can I help you today?'
  }

  return { persona, fallback: parseFallback(readObject(item, 'fallback'), `${where}.fallback`) }
}

function parseFallback(value: object | null, where: string): FallbackScript {
  if (!value) {
    throw new ConfigError(`${where} is required`)
  }

  const rules = readField(value, 'rules')
  if (!Array.isArray(rules)) {
    throw new ConfigError(`${where}.rules must be an array`)
  }

  return {
    rules: rules.map((rule: unknown, index): FallbackRule => {
      const ruleWhere = `${where}.rules[${index}]`
      if (typeof rule !== 'object' || rule === null) {
        throw new ConfigError(`${ruleWhere} must be an object`)
      }
      const keywords = readField(rule, 'keywords')
      if (!Array.isArray(keywords) || !keywords.every((k: unknown): k is string => typeof k === 'string')) {
        throw new ConfigError(`${ruleWhere}.keywords must be an array of strings`)
      }
      return {
        keywords: keywords.map(keyword => keyword.toLowerCase()),
        reply: requireString(rule, 'reply', ruleWhere)
      }
    }),
    default: requireString(value, 'default', where)
  }
}
