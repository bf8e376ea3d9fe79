/**
 * Payload codecs for the durable tier
 * The stored method name selects how a payload is turned back into a value
 */

/**
 * Encodes a value for storage and decodes it on an L2 hit
 */
export interface CacheCodec<T = unknown> {
  encode(value: T): string
  decode(json: string): T
}

/** Pattern to detect prototype pollution attempts before parsing */
const PROTOTYPE_POLLUTION_PATTERN = /"(__proto__|prototype|constructor)"\s*:/i

/**
 * Recursively check for dangerous keys in parsed objects.
 * Catches unicode-escaped keys that JSON.parse decodes after the regex check.
 */
function hasDangerousKeys(obj: unknown, depth = 0): boolean {
  if (depth > 100) return false
  if (typeof obj !== 'object' || obj === null) return false

  if (Array.isArray(obj)) {
    return obj.some((item) => hasDangerousKeys(item, depth + 1))
  }

  for (const key of Object.keys(obj)) {
    if (key === '__proto__' || key === 'prototype' || key === 'constructor') {
      return true
    }
    if (hasDangerousKeys(Reflect.get(obj, key), depth + 1)) {
      return true
    }
  }

  return false
}

/**
 * Default codec: plain JSON with prototype-pollution checks
 */
export const jsonCodec: CacheCodec<unknown> = {
  encode(value: unknown): string {
    const json = JSON.stringify(value)
    if (json === undefined) {
      throw new Error('Value is not JSON serializable')
    }
    return json
  },
  decode(json: string): unknown {
    if (PROTOTYPE_POLLUTION_PATTERN.test(json)) {
      throw new Error('Prototype pollution attempt detected in cache data')
    }
    const data: unknown = JSON.parse(json)
    if (hasDangerousKeys(data)) {
      throw new Error('Prototype pollution attempt detected in cache data')
    }
    return data
  },
}

/**
 * Method name -> codec lookup, falling back to `jsonCodec`
 */
export class CodecRegistry {
  private readonly codecs = new Map<string, CacheCodec<unknown>>()

  register(methodName: string, codec: CacheCodec<unknown>): this {
    this.codecs.set(methodName, codec)
    return this
  }

  codecFor(methodName: string): CacheCodec<unknown> {
    return this.codecs.get(methodName) ?? jsonCodec
  }

  has(methodName: string): boolean {
    return this.codecs.has(methodName)
  }
}
