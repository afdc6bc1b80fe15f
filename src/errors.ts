/**
 * Typed errors for contract-courier.
 *
 * Every network-boundary failure is wrapped in one of the classes below with
 * enough `context` (endpoint, payload summary) to diagnose it from a log line.
 * - Encoding / building:   EncodingError, SequenceMismatchError
 * - External services:     CompileError, ChainQueryError, SigningError, BroadcastError
 * - Confirmation:          ConfirmationTimeout
 * - Call encoding:         UnknownFunctionError, ArgumentArityError, ArgumentTypeError, DecodeError
 * - Registry:              NotFoundError, RegistryError
 * - Configuration:         ConfigError
 */

export interface BaseErrorOptions {
  /** Optional numeric code (e.g., HTTP status or JSON-RPC error code). */
  code?: number
  /** Arbitrary structured data (e.g., the raw response body). */
  data?: unknown
  cause?: unknown
  /** Additional context fields (safe to log). */
  context?: Record<string, unknown>
}

/** Narrow error-like shapes without forcing instanceof checks across realms. */
export function isErrorLike(x: unknown): x is { message: string } {
  return !!x && typeof x === 'object' && 'message' in x && typeof x.message === 'string'
}

/** Coerce unknown into an Error with best-effort message. */
export function ensureError(e: unknown, fallback = 'Unknown error'): Error {
  if (e instanceof Error) return e
  if (isErrorLike(e)) return new Error(e.message)
  try {
    return new Error(typeof e === 'string' ? e : JSON.stringify(e))
  } catch {
    return new Error(fallback)
  }
}

/** Base error with optional machine-readable fields. */
export class BaseError extends Error {
  readonly code?: number
  readonly data?: unknown
  override readonly cause?: unknown
  readonly context?: Record<string, unknown>

  constructor(message: string, opts: BaseErrorOptions = {}) {
    super(message, { cause: opts.cause })
    this.name = new.target.name
    this.code = opts.code
    this.data = opts.data
    this.cause = opts.cause
    this.context = opts.context
  }
}

/** A transaction or value could not be rendered to its canonical form. */
export class EncodingError extends BaseError {
  /** JSON path of the offending value, when known (e.g. `$.tx[1].fee`). */
  readonly path?: string

  constructor(message: string, opts: BaseErrorOptions & { path?: string } = {}) {
    super(message, opts)
    this.path = opts.path
  }
}

/** Explicit sequence does not equal the account's on-chain sequence + 1. */
export class SequenceMismatchError extends BaseError {
  readonly expected: bigint
  readonly actual: bigint

  constructor(expected: bigint, actual: bigint, opts: BaseErrorOptions = {}) {
    super(`Stale or invalid sequence: expected ${expected}, got ${actual}`, opts)
    this.expected = expected
    this.actual = actual
  }
}

/** Compile service returned nothing usable. Fatal for the deployment attempt. */
export class CompileError extends BaseError {}

/** Reading chain state (status, account, code, simulated call) failed. */
export class ChainQueryError extends BaseError {
  readonly endpoint?: string

  constructor(message: string, opts: BaseErrorOptions & { endpoint?: string } = {}) {
    super(message, opts)
    this.endpoint = opts.endpoint
  }
}

/** The external signer refused or failed to sign / return a public key. */
export class SigningError extends BaseError {}

/** Transport failure or node-side rejection of a submitted transaction. */
export class BroadcastError extends BaseError {
  /** Rejection reason as reported by the node (or the transport error message). */
  readonly reason: string

  constructor(message: string, opts: BaseErrorOptions & { reason: string }) {
    super(message, opts)
    this.reason = opts.reason
  }
}

export type ConfirmationTimeoutReason = 'deadline' | 'cancelled'

/** No block above the start height was observed before the deadline or cancellation. */
export class ConfirmationTimeout extends BaseError {
  readonly reason: ConfirmationTimeoutReason
  readonly startHeight?: number
  readonly lastHeight?: number
  readonly elapsedMs: number

  constructor(
    message: string,
    opts: BaseErrorOptions & {
      reason: ConfirmationTimeoutReason
      startHeight?: number
      lastHeight?: number
      elapsedMs: number
    }
  ) {
    super(message, opts)
    this.reason = opts.reason
    this.startHeight = opts.startHeight
    this.lastHeight = opts.lastHeight
    this.elapsedMs = opts.elapsedMs
  }
}

export class UnknownFunctionError extends BaseError {
  readonly functionName: string

  constructor(functionName: string, opts: BaseErrorOptions = {}) {
    super(`Function "${functionName}" is not in the interface description`, opts)
    this.functionName = functionName
  }
}

export class ArgumentArityError extends BaseError {
  readonly expected: number
  readonly actual: number

  constructor(functionName: string, expected: number, actual: number, opts: BaseErrorOptions = {}) {
    super(`${functionName}: expected ${expected} argument(s), got ${actual}`, opts)
    this.expected = expected
    this.actual = actual
  }
}

export class ArgumentTypeError extends BaseError {
  readonly argIndex?: number
  readonly declaredType: string

  constructor(message: string, opts: BaseErrorOptions & { declaredType: string; argIndex?: number }) {
    super(message, opts)
    this.declaredType = opts.declaredType
    this.argIndex = opts.argIndex
  }
}

/** Return data is shorter than, or inconsistent with, the declared output types. */
export class DecodeError extends BaseError {}

/** Registry lookup miss. */
export class NotFoundError extends BaseError {
  readonly key: string

  constructor(key: string, opts: BaseErrorOptions = {}) {
    super(`No contract record named "${key}"`, opts)
    this.key = key
  }
}

/** Registry storage is unreadable, malformed, or an update conflicts with stored data. */
export class RegistryError extends BaseError {}

export class ConfigError extends BaseError {}

/**
 * Human-friendly stringification of an error for logs.
 */
export function formatError(e: unknown): string {
  if (e instanceof BaseError) {
    const parts = [e.name, e.message]
    if (e instanceof BroadcastError && e.reason !== e.message) parts.push(`reason=${e.reason}`)
    if (e instanceof ChainQueryError && e.endpoint) parts.push(`endpoint=${e.endpoint}`)
    if (e.code !== undefined) parts.push(`code=${e.code}`)
    if (e.cause !== undefined) parts.push(`cause=${ensureError(e.cause).message}`)
    return parts.join(' | ')
  }
  const err = ensureError(e)
  return `${err.name}: ${err.message}`
}
