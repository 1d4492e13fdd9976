/**
 * Parse JSON text into an object record
 * @returns null when the text is not JSON or not a plain object
 */
export function parseJsonObject(text: string): object | null {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch {
    return null
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null
  }
  return value
}

export function readField(value: object, key: string): unknown {
  return Reflect.get(value, key)
}

export function readString(value: object, key: string): string | null {
  const field = readField(value, key)
  return typeof field === 'string' ? field : null
}

export function readObject(value: object, key: string): object | null {
  const field = readField(value, key)
  return typeof field === 'object' && field !== null ? field : null
}
