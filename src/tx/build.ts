/**
 * Transaction builder.
 *
 * Produces a CallTx from an account snapshot. The sequence is always the
 * account's committed sequence + 1; an explicit sequence that disagrees is a
 * stale read and is rejected rather than corrected.
 *
 * Pure: no I/O, no clock, no randomness.
 */

import { isAddress, normalizeAddress } from '../address'
import { EncodingError, SequenceMismatchError } from '../errors'
import type { Account, CallTx, SignedTransaction } from '../types/core'
import { isHexString, toBytes, type BytesLike } from '../utils/bytes'

export interface BuildCallTxParams {
  /** Sender snapshot, as just read from the node. */
  account: Account
  /** Target contract; omit or '' to create a contract from `payload`. */
  recipient?: string
  /** Bytecode (deploy) or call data. */
  payload: BytesLike
  fee: bigint
  gasLimit: bigint
  amount: bigint
  /** Optional explicit sequence; must equal account.sequence + 1. */
  sequence?: bigint
}

export function buildCallTx(p: BuildCallTxParams): CallTx {
  let payload: Uint8Array
  try {
    payload = toBytes(p.payload)
  } catch (e) {
    throw new EncodingError('payload must be bytes or hex', { path: '$.payload', cause: e })
  }
  const expected = nextSequence(p.account)
  if (p.sequence !== undefined && p.sequence !== expected) {
    throw new SequenceMismatchError(expected, p.sequence, { context: { address: p.account.address } })
  }
  const tx: CallTx = {
    kind: 'call',
    sender: normalizeAddress(p.account.address, 'sender'),
    recipient: p.recipient ? normalizeAddress(p.recipient, 'recipient') : '',
    amount: p.amount,
    fee: p.fee,
    gasLimit: p.gasLimit,
    payload,
    sequence: expected
  }
  assertCallTx(tx)
  return tx
}

export function nextSequence(account: Account): bigint {
  if (typeof account.sequence !== 'bigint' || account.sequence < 0n) {
    throw new EncodingError('account sequence must be a non-negative bigint', { path: '$.account.sequence' })
  }
  return account.sequence + 1n
}

/** Throws SequenceMismatchError unless `tx` is the next transaction for `account`. */
export function assertNextSequence(tx: CallTx, account: Account): void {
  const expected = nextSequence(account)
  if (tx.sequence !== expected) {
    throw new SequenceMismatchError(expected, tx.sequence, { context: { address: account.address } })
  }
}

/** Combine a built transaction with the signer's output. */
export function attachSignature(tx: CallTx, sig: { publicKey: string; signature: string }): SignedTransaction {
  assertCallTx(tx)
  return {
    tx,
    publicKey: wireHexField(sig.publicKey, 'publicKey'),
    signature: wireHexField(sig.signature, 'signature')
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Validation
// ──────────────────────────────────────────────────────────────────────────────

const UINT_FIELDS = ['amount', 'fee', 'gasLimit', 'sequence'] as const

/**
 * Runtime check of a call transaction. Accepts anything so that objects
 * assembled outside the builder (deserialised, spread, partially filled)
 * fail with the field's path instead of producing malformed sign bytes.
 */
export function assertCallTx(tx: unknown): asserts tx is CallTx {
  if (!tx || typeof tx !== 'object') throw new EncodingError('transaction must be an object', { path: '$' })
  const rec: Record<string, unknown> = { ...tx }
  if (rec.kind !== 'call') throw new EncodingError(`unsupported transaction kind: ${String(rec.kind)}`, { path: '$.kind' })

  for (const f of UINT_FIELDS) {
    const v = rec[f]
    if (typeof v !== 'bigint') throw new EncodingError(`${f} is missing or not a bigint`, { path: `$.${f}` })
    if (v < 0n) throw new EncodingError(`${f} must be non-negative`, { path: `$.${f}` })
  }
  if (rec.sequence === 0n) throw new EncodingError('sequence starts at 1', { path: '$.sequence' })

  if (!isAddress(rec.sender)) throw new EncodingError('sender must be a 20-byte hex address', { path: '$.sender' })
  if (rec.recipient !== '' && !isAddress(rec.recipient)) {
    throw new EncodingError('recipient must be empty or a 20-byte hex address', { path: '$.recipient' })
  }
  if (!(rec.payload instanceof Uint8Array)) throw new EncodingError('payload must be a Uint8Array', { path: '$.payload' })
}

function wireHexField(v: string, field: string): string {
  if (typeof v !== 'string' || v.length === 0 || !isHexString(v)) {
    throw new EncodingError(`${field} must be non-empty hex`, { path: `$.${field}` })
  }
  return v.replace(/^0x/i, '').toUpperCase()
}
