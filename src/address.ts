/**
 * Account addresses: 20-byte public-key hashes, hex-encoded.
 * The node accepts either case; we keep everything uppercase so records,
 * sign bytes and log lines compare byte-for-byte.
 */

import { EncodingError } from './errors'

export const ADDRESS_BYTES = 20

const ADDRESS_RE = /^(?:0x)?[0-9a-fA-F]{40}$/

export function isAddress(v: unknown): v is string {
  return typeof v === 'string' && ADDRESS_RE.test(v)
}

/** Throws EncodingError unless `v` is a 20-byte hex address. */
export function assertAddress(v: unknown, label = 'address'): asserts v is string {
  if (!isAddress(v)) {
    throw new EncodingError(`${label} must be a ${ADDRESS_BYTES}-byte hex address`, { context: { [label]: v } })
  }
}

/** Validate and return the canonical (uppercase, unprefixed) form. */
export function normalizeAddress(v: unknown, label = 'address'): string {
  assertAddress(v, label)
  return v.replace(/^0x/i, '').toUpperCase()
}
