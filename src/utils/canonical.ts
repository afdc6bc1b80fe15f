/**
 * Canonical JSON.
 *
 * The node and the signer agree on a transaction by comparing bytes, so the
 * encoding must not depend on object insertion order or on how a number
 * happens to be typed:
 *  - object keys sorted lexicographically (UTF-16 code unit order) at every level
 *  - no insignificant whitespace
 *  - integers (bigint or safe-integer number) as plain decimal
 *  - strings escaped as JSON.stringify does
 *
 * Fractions, NaN/Infinity, undefined, functions and symbols are rejected with
 * an EncodingError naming the JSON path.
 */

import { EncodingError } from '../errors'

export type CanonicalValue =
  | null
  | boolean
  | string
  | number
  | bigint
  | CanonicalValue[]
  | { [key: string]: CanonicalValue }

export function encodeCanonicalJson(value: unknown): string {
  return encodeAt(value, '$')
}

function encodeAt(value: unknown, path: string): string {
  if (value === null) return 'null'
  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false'
    case 'string':
      return JSON.stringify(value)
    case 'bigint':
      return value.toString(10)
    case 'number':
      if (!Number.isSafeInteger(value)) {
        throw new EncodingError(`Non-integer or unsafe number at ${path}: ${value}`, { path })
      }
      // -0 renders as 0
      return value === 0 ? '0' : String(value)
    case 'object':
      break
    default:
      throw new EncodingError(`Unsupported ${typeof value} at ${path}`, { path })
  }

  if (Array.isArray(value)) {
    return `[${value.map((v, i) => encodeAt(v, `${path}[${i}]`)).join(',')}]`
  }
  if (value instanceof Uint8Array) {
    throw new EncodingError(`Raw bytes at ${path}; encode them as hex first`, { path })
  }

  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  const body = entries.map(([k, v]) => `${JSON.stringify(k)}:${encodeAt(v, `${path}.${k}`)}`)
  return `{${body.join(',')}}`
}
