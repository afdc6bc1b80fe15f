/**
 * Contract call encoding/decoding against a JSON ABI.
 *
 * Call data = 4-byte selector (first bytes of keccak256("name(type,…)")) followed
 * by 32-byte words: static arguments in place, dynamic `bytes`/`string` as an
 * offset in the head and length + padded data in the tail.
 *
 * Supported types: uintN, intN (N = 8…256, step 8; bare int/uint mean 256),
 * bool, address (20 bytes), bytesN (1…32), bytes, string. Arrays, tuples and
 * fixed-point types are rejected with ArgumentTypeError.
 */

import {
  ArgumentArityError,
  ArgumentTypeError,
  DecodeError,
  UnknownFunctionError
} from '../errors'
import { functionsNamed, type Abi, type AbiFunction, type AbiParam } from '../types/abi'
import {
  bigIntToBytesBE,
  bytesToBigIntBE,
  bytesToHex,
  concatBytes,
  hexToBytes,
  isHexString,
  padRight,
  strip0x,
  utf8ToBytes
} from '../utils/bytes'
import { keccak256Utf8 } from '../utils/hash'

export type AbiValue = bigint | number | string | boolean | Uint8Array
export type DecodedValue = bigint | boolean | string | Uint8Array

const WORD = 32
const TWO_256 = 1n << 256n

// ──────────────────────────────────────────────────────────────────────────────
// Types
// ──────────────────────────────────────────────────────────────────────────────

type ParsedType =
  | { kind: 'int'; signed: boolean; bits: number }
  | { kind: 'bool' }
  | { kind: 'address' }
  | { kind: 'fixedBytes'; size: number }
  | { kind: 'bytes' }
  | { kind: 'string' }

/** Canonical spelling used in signatures: `int` → `int256`, `uint` → `uint256`, `byte` → `bytes1`. */
export function canonicalType(t: string): string {
  if (t === 'int') return 'int256'
  if (t === 'uint') return 'uint256'
  if (t === 'byte') return 'bytes1'
  return t
}

function parseType(raw: string, argIndex?: number): ParsedType {
  const t = canonicalType(raw)
  const unsupported = () =>
    new ArgumentTypeError(`Unsupported ABI type "${raw}"`, { declaredType: raw, argIndex })

  const int = /^(u?)int(\d+)$/.exec(t)
  if (int) {
    const bits = Number(int[2])
    if (bits < 8 || bits > 256 || bits % 8 !== 0) throw unsupported()
    return { kind: 'int', signed: int[1] === '', bits }
  }
  const fixed = /^bytes(\d+)$/.exec(t)
  if (fixed) {
    const size = Number(fixed[1])
    if (size < 1 || size > 32) throw unsupported()
    return { kind: 'fixedBytes', size }
  }
  switch (t) {
    case 'bool':
      return { kind: 'bool' }
    case 'address':
      return { kind: 'address' }
    case 'bytes':
      return { kind: 'bytes' }
    case 'string':
      return { kind: 'string' }
    default:
      throw unsupported()
  }
}

const isDynamic = (p: ParsedType) => p.kind === 'bytes' || p.kind === 'string'

// ──────────────────────────────────────────────────────────────────────────────
// Signatures & selectors
// ──────────────────────────────────────────────────────────────────────────────

export function functionSignature(fn: Pick<AbiFunction, 'name' | 'inputs'>): string {
  return `${fn.name}(${fn.inputs.map((p) => canonicalType(p.type)).join(',')})`
}

export function functionSelector(fn: Pick<AbiFunction, 'name' | 'inputs'>): Uint8Array {
  return keccak256Utf8(functionSignature(fn)).slice(0, 4)
}

/**
 * Resolve `name` in `abi`. Overloads are told apart by argument count; with
 * `argCount` omitted the first declaration wins.
 */
export function findFunction(abi: Abi, name: string, argCount?: number): AbiFunction {
  const candidates = functionsNamed(abi, name)
  if (candidates.length === 0) throw new UnknownFunctionError(name)
  if (argCount === undefined) return candidates[0]
  const match = candidates.find((f) => f.inputs.length === argCount)
  if (!match) throw new ArgumentArityError(name, candidates[0].inputs.length, argCount)
  return match
}

// ──────────────────────────────────────────────────────────────────────────────
// Encoding
// ──────────────────────────────────────────────────────────────────────────────

/** Selector + encoded arguments. */
export function encodeCall(abi: Abi, name: string, args: readonly AbiValue[]): Uint8Array {
  const fn = findFunction(abi, name, args.length)
  return concatBytes([functionSelector(fn), encodeArguments(fn.inputs, args)])
}

export function encodeArguments(params: readonly AbiParam[], args: readonly AbiValue[]): Uint8Array {
  const types = params.map((p, i) => parseType(p.type, i))
  const head: Uint8Array[] = []
  const tail: Uint8Array[] = []
  let tailOffset = WORD * types.length

  types.forEach((t, i) => {
    const decl = params[i].type
    if (isDynamic(t)) {
      const data = t.kind === 'string' ? toUtf8(args[i], decl, i) : toDynamicBytes(args[i], decl, i)
      const padded = padRight(data, Math.ceil(data.length / WORD) * WORD)
      head.push(uintWord(BigInt(tailOffset)))
      tail.push(uintWord(BigInt(data.length)), padded)
      tailOffset += WORD + padded.length
    } else {
      head.push(encodeStatic(t, args[i], decl, i))
    }
  })
  return concatBytes([...head, ...tail])
}

function encodeStatic(t: ParsedType, v: AbiValue, decl: string, i: number): Uint8Array {
  switch (t.kind) {
    case 'int':
      return encodeInt(t.signed, t.bits, v, decl, i)
    case 'bool':
      if (typeof v !== 'boolean') throw typeError(`expected boolean`, decl, i)
      return uintWord(v ? 1n : 0n)
    case 'address': {
      if (typeof v !== 'string' || !/^(?:0x)?[0-9a-fA-F]{40}$/.test(v)) throw typeError('expected a 20-byte hex address', decl, i)
      return uintWord(bytesToBigIntBE(hexToBytes(v)))
    }
    case 'fixedBytes': {
      const b = toDynamicBytes(v, decl, i)
      if (b.length !== t.size) throw typeError(`expected exactly ${t.size} byte(s), got ${b.length}`, decl, i)
      return padRight(b, WORD)
    }
    default:
      throw typeError('dynamic type in static position', decl, i)
  }
}

function encodeInt(signed: boolean, bits: number, v: AbiValue, decl: string, i: number): Uint8Array {
  const n = toBigInt(v, decl, i)
  const max = signed ? (1n << BigInt(bits - 1)) - 1n : (1n << BigInt(bits)) - 1n
  const min = signed ? -(1n << BigInt(bits - 1)) : 0n
  if (n < min || n > max) throw typeError(`value ${n} out of range for ${canonicalType(decl)}`, decl, i)
  return uintWord(n < 0n ? TWO_256 + n : n)
}

function toBigInt(v: AbiValue, decl: string, i: number): bigint {
  if (typeof v === 'bigint') return v
  if (typeof v === 'number') {
    if (!Number.isSafeInteger(v)) throw typeError('expected a safe integer', decl, i)
    return BigInt(v)
  }
  if (typeof v === 'string') {
    const s = v.trim()
    if (/^-?\d+$/.test(s)) return BigInt(s)
    if (/^0x[0-9a-fA-F]+$/i.test(s)) return BigInt(s)
  }
  throw typeError('expected an integer (bigint, number, decimal or 0x-hex string)', decl, i)
}

function toDynamicBytes(v: AbiValue, decl: string, i: number): Uint8Array {
  if (v instanceof Uint8Array) return v
  if (typeof v === 'string' && isHexString(v)) return hexToBytes(v)
  throw typeError('expected bytes or a hex string', decl, i)
}

function toUtf8(v: AbiValue, decl: string, i: number): Uint8Array {
  if (typeof v !== 'string') throw typeError('expected a string', decl, i)
  return utf8ToBytes(v)
}

function uintWord(n: bigint): Uint8Array {
  return bigIntToBytesBE(n, WORD)
}

function typeError(msg: string, decl: string, argIndex: number): ArgumentTypeError {
  return new ArgumentTypeError(`Argument ${argIndex} (${decl}): ${msg}`, { declaredType: decl, argIndex })
}

// ──────────────────────────────────────────────────────────────────────────────
// Decoding
// ──────────────────────────────────────────────────────────────────────────────

/** Unsigned big-endian integer from hex; padding is irrelevant, empty or all-zero is 0. */
export function decodeInteger(hex: string): bigint {
  const clean = strip0x(hex.trim())
  if (clean === '') return 0n
  if (!/^[0-9a-fA-F]+$/.test(clean)) throw new DecodeError(`Not a hex integer: ${hex.slice(0, 80)}`)
  return BigInt(`0x${clean}`)
}

/** Decode return data by the function's declared outputs. */
export function decodeOutputs(outputs: readonly AbiParam[], hex: string): DecodedValue[] {
  const clean = strip0x(hex.trim())
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) throw new DecodeError('Return data is not hex')
  const data = hexToBytes(clean)
  const types = outputs.map((p) => parseType(p.type))

  return types.map((t, i) => {
    const word = readWord(data, i * WORD, outputs[i].type)
    switch (t.kind) {
      case 'int': {
        const n = bytesToBigIntBE(word)
        return t.signed && n >= TWO_256 >> 1n ? n - TWO_256 : n
      }
      case 'bool':
        return bytesToBigIntBE(word) !== 0n
      case 'address':
        return bytesToHex(word.slice(WORD - 20)).toUpperCase()
      case 'fixedBytes':
        return word.slice(0, t.size)
      case 'bytes':
      case 'string': {
        const off = Number(bytesToBigIntBE(word))
        const len = Number(bytesToBigIntBE(readWord(data, off, outputs[i].type)))
        if (off + WORD + len > data.length) throw new DecodeError(`Return data too short for ${outputs[i].type} at output ${i}`)
        const raw = data.slice(off + WORD, off + WORD + len)
        return t.kind === 'string' ? new TextDecoder().decode(raw) : raw
      }
    }
  })
}

/**
 * Decode a function's return data. One declared output yields the value
 * itself, several yield an array, none yield undefined.
 */
export function decodeReturn(
  abi: Abi,
  name: string,
  hex: string,
  argCount?: number
): DecodedValue | DecodedValue[] | undefined {
  const fn = findFunction(abi, name, argCount)
  if (fn.outputs.length === 0) return undefined
  const values = decodeOutputs(fn.outputs, hex)
  return values.length === 1 ? values[0] : values
}

function readWord(data: Uint8Array, offset: number, type: string): Uint8Array {
  if (offset + WORD > data.length) {
    throw new DecodeError(`Return data too short: need ${offset + WORD} bytes for ${type}, have ${data.length}`)
  }
  return data.slice(offset, offset + WORD)
}
