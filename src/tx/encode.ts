/**
 * Canonical encoding of call transactions.
 *
 * Sign bytes are the UTF-8 of
 *
 *   {"chain_id":"<id>","tx":[2,{"address":"<recipient>","data":"<HEX>","fee":F,
 *     "gas_limit":G,"input":{"address":"<sender>","amount":A,"sequence":S}}]}
 *
 * rendered by the canonical JSON encoder (sorted keys, no whitespace). The
 * signer receives them as uppercase hex. The signed form adds the signature
 * and public key, each tagged with the key type, under `input`.
 */

import { TX_TYPE_TAG, KEY_TYPE_ED25519, type CallTx, type SignedTransaction } from '../types/core'
import { encodeCanonicalJson, type CanonicalValue } from '../utils/canonical'
import { toWireHex, utf8ToBytes } from '../utils/bytes'
import { assertCallTx } from './build'

function txBody(tx: CallTx): { [key: string]: CanonicalValue } {
  return {
    address: tx.recipient,
    data: toWireHex(tx.payload),
    fee: tx.fee,
    gas_limit: tx.gasLimit,
    input: {
      address: tx.sender,
      amount: tx.amount,
      sequence: tx.sequence
    }
  }
}

/** Canonical JSON text that gets signed. */
export function signBytesJson(chainId: string, tx: CallTx): string {
  assertCallTx(tx)
  return encodeCanonicalJson({ chain_id: chainId, tx: [TX_TYPE_TAG[tx.kind], txBody(tx)] })
}

/** Domain-bound bytes to sign: UTF-8 of the canonical JSON. */
export function makeSignBytes(chainId: string, tx: CallTx): Uint8Array {
  return utf8ToBytes(signBytesJson(chainId, tx))
}

/** Sign bytes as the signer takes them: uppercase hex, two characters per byte. */
export function signBytesHex(chainId: string, tx: CallTx): string {
  return toWireHex(makeSignBytes(chainId, tx))
}

/** Wire tuple for broadcast_tx. */
export function encodeSignedTx(signed: SignedTransaction): CanonicalValue {
  const { tx } = signed
  assertCallTx(tx)
  const body = txBody(tx)
  return [
    TX_TYPE_TAG[tx.kind],
    {
      ...body,
      input: {
        address: tx.sender,
        amount: tx.amount,
        sequence: tx.sequence,
        signature: [KEY_TYPE_ED25519, signed.signature],
        pub_key: [KEY_TYPE_ED25519, signed.publicKey]
      }
    }
  ]
}
