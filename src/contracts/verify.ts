/**
 * Deployed-code check.
 *
 * The bytecode sent in a create transaction carries the constructor/init
 * sequence around the runtime code, so what ends up stored at the contract
 * address is a part of what was submitted, not all of it. Verification
 * passes when the stored code occurs, byte-aligned, inside the submitted
 * bytecode.
 *
 * Known limitation: a contract whose code is some other substring of the
 * submitted bytecode also passes.
 */

import type { BytesLike } from '../utils/bytes'
import { toWireHex } from '../utils/bytes'

export interface VerificationResult {
  ok: boolean
  /** Uppercase hex of the code read from the chain. */
  deployed: string
  /** Uppercase hex of the submitted bytecode. */
  submitted: string
  /** Byte offset of `deployed` within `submitted`, when found. */
  offset?: number
}

export function verifyBytecode(deployed: BytesLike, submitted: BytesLike): VerificationResult {
  const d = toWireHex(deployed)
  const s = toWireHex(submitted)
  if (d.length === 0) return { ok: false, deployed: d, submitted: s }

  // Only even character offsets are byte boundaries.
  for (let i = s.indexOf(d); i !== -1; i = s.indexOf(d, i + 1)) {
    if (i % 2 === 0) return { ok: true, deployed: d, submitted: s, offset: i / 2 }
  }
  return { ok: false, deployed: d, submitted: s }
}
