/**
 * Core chain types for contract-courier.
 *
 * Conventions:
 *  - Addresses are 20-byte hex strings, uppercase, no 0x.
 *  - Hex on the wire is bare and uppercase.
 *  - Integers that go into a transaction are bigint in memory and plain
 *    decimal JSON numbers on the wire.
 */

import type { Abi } from './abi'

//// ────────────────────────────────────────────────────────────────────────────
// Tags
////

/** Transaction-kind tag as the node's tuple encoding expects it. */
export const TX_TYPE_TAG = {
  call: 2
} as const

export type TxKind = keyof typeof TX_TYPE_TAG

/** Key / signature type tag (ed25519). */
export const KEY_TYPE_ED25519 = 1

//// ────────────────────────────────────────────────────────────────────────────
// Accounts
////

export interface Account {
  address: string
  /** Number of transactions already committed from this address. */
  sequence: bigint
}

/** Account as read from the node: also carries the code stored under it. */
export interface AccountState extends Account {
  /** Uppercase hex; empty for externally-owned or unknown accounts. */
  code: string
}

//// ────────────────────────────────────────────────────────────────────────────
// Transactions
////

export interface CallTx {
  kind: 'call'
  sender: string
  /** Target contract; empty string creates a contract from `payload`. */
  recipient: string
  amount: bigint
  fee: bigint
  gasLimit: bigint
  /** Bytecode when deploying, call data otherwise. */
  payload: Uint8Array
  sequence: bigint
}

/** Only the call kind exists today; further kinds join this union. */
export type Transaction = CallTx

export interface SignedTransaction {
  tx: Transaction
  /** Uppercase hex as returned by the signer. */
  publicKey: string
  /** Uppercase hex as returned by the signer. */
  signature: string
}

export interface Receipt {
  txHash?: string
  /** Set when the transaction created a contract. */
  contractAddress?: string
  createsContract: boolean
}

//// ────────────────────────────────────────────────────────────────────────────
// Contracts
////

export interface ContractSource {
  name: string
  code: string
}

export interface CompiledArtifact {
  readonly bytecode: Uint8Array
  /** Uppercase wire hex of `bytecode`. */
  readonly bytecodeHex: string
  readonly abi: Abi
}

export interface ContractRecord {
  contractName: string
  abi: Abi
  deployerAddress: string
  deployedAddress?: string
  /** Uppercase hex of the bytecode that was submitted, kept for re-verification. */
  bytecode?: string
}
