/**
 * Byte helpers.
 * - Hex (the node speaks bare uppercase hex, no 0x) / UTF-8 / Base64 conversions
 * - Concat / right-pad
 * - BigInt ↔ bytes (big-endian)
 */

export type BytesLike = Uint8Array | string // hex "0x.." or bare hex

/** Return true if string looks like hex (0x.. or naked) and has even length (after 0x strip). */
export function isHexString(s: unknown): s is string {
  if (typeof s !== 'string') return false
  const t = strip0x(s)
  return t.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(t)
}

/** Strip 0x/0X prefix if present. */
export function strip0x(s: string): string {
  return s.startsWith('0x') || s.startsWith('0X') ? s.slice(2) : s
}

/** Convert hex string (with or without 0x) to Uint8Array. Empty string → empty bytes. */
export function hexToBytes(hex: string): Uint8Array {
  const clean = strip0x(hex)
  if (clean.length === 0) return new Uint8Array()
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(clean)) {
    throw new Error(`hexToBytes: invalid hex string length/characters`)
  }
  const out = new Uint8Array(clean.length / 2)
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(2 * i, 2 * i + 2), 16)
  }
  return out
}

/** Convert bytes to lowercase hex string, 0x-prefixed on request. */
export function bytesToHex(bytes: Uint8Array, with0x = false): string {
  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('')
  return with0x ? `0x${hex}` : hex
}

/**
 * Wire hex: uppercase, two characters per byte, no prefix.
 * This is how the node and the signer exchange bytecode, call data and sign bytes.
 */
export function toWireHex(input: BytesLike): string {
  if (typeof input === 'string') {
    if (!isHexString(input)) throw new Error('toWireHex: invalid hex string')
    return strip0x(input).toUpperCase()
  }
  return bytesToHex(input).toUpperCase()
}

/** Normalize BytesLike into a Uint8Array. */
export function toBytes(v: BytesLike): Uint8Array {
  if (v instanceof Uint8Array) return v
  if (!isHexString(v)) throw new Error('toBytes: only hex strings are supported')
  return hexToBytes(v)
}

/** Convert UTF-8 string to bytes. */
export function utf8ToBytes(s: string): Uint8Array {
  return new TextEncoder().encode(s)
}

/** Base64 encode (standard alphabet, padded, never wrapped). */
export function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64')
}

/**
 * Base64 decode. Accepts the URL-safe alphabet, missing padding and embedded
 * line breaks (some services wrap long output).
 */
export function base64ToBytes(b64: string): Uint8Array {
  const norm = b64.replace(/\s+/g, '').replace(/-/g, '+').replace(/_/g, '/')
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(norm)) throw new Error('base64ToBytes: invalid base64')
  const pad = norm.length % 4 === 0 ? '' : '='.repeat(4 - (norm.length % 4))
  return new Uint8Array(Buffer.from(norm + pad, 'base64'))
}

/** Concatenate multiple byte arrays. */
export function concatBytes(list: Uint8Array[]): Uint8Array {
  const size = list.reduce((n, a) => n + a.length, 0)
  const out = new Uint8Array(size)
  let off = 0
  for (const a of list) {
    out.set(a, off)
    off += a.length
  }
  return out
}

/** Right-pad with zeros to desired length. */
export function padRight(bytes: Uint8Array, len: number): Uint8Array {
  if (bytes.length > len) throw new Error(`padRight: input longer than target length`)
  const out = new Uint8Array(len)
  out.set(bytes, 0)
  return out
}

/** Big-endian bigint → bytes, left-padded to `len`. */
export function bigIntToBytesBE(x: bigint, len: number): Uint8Array {
  if (x < 0n) throw new Error('bigIntToBytesBE: negative not supported')
  const out = new Uint8Array(len)
  let v = x
  for (let i = len - 1; i >= 0 && v > 0n; i--) {
    out[i] = Number(v & 0xffn)
    v >>= 8n
  }
  if (v > 0n) throw new Error(`bigIntToBytesBE: value does not fit in ${len} bytes`)
  return out
}

/** Big-endian bytes → bigint. */
export function bytesToBigIntBE(bytes: Uint8Array): bigint {
  let x = 0n
  for (let i = 0; i < bytes.length; i++) {
    x = (x << 8n) | BigInt(bytes[i])
  }
  return x
}

/** Pretty-print short hex (first 8 + … + last 4), for logs. */
export function shortHex(input: BytesLike, head = 8, tail = 4): string {
  const s = typeof input === 'string' ? strip0x(input) : bytesToHex(input)
  if (s.length <= head + tail) return s
  return `${s.slice(0, head)}…${s.slice(-tail)}`
}
