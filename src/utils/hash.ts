/**
 * Hash utilities built on @noble/hashes.
 *
 * Function selectors use Ethereum-style Keccak-256 (not NIST SHA3-256): the
 * contract VM on the node routes calls by `keccak256(signature)[0..4]`.
 */

import { keccak_256 as _keccak256 } from '@noble/hashes/sha3'
import { utf8ToBytes } from './bytes'

/** Keccak-256 of a UTF-8 string. */
export function keccak256Utf8(text: string): Uint8Array {
  return _keccak256(utf8ToBytes(text))
}
