/**
 * Sign, submit and (optionally) await confirmation of a call transaction.
 *
 *   read sequence → build → canonical sign bytes → /sign → /pub → attach → broadcast_tx → poll height
 *
 * The node only reports committed sequences, so a second transaction from the
 * same sender must not be built before the first is in a block. The whole
 * pipeline therefore runs under a per-sender lock, held through confirmation
 * unless the caller opts out with `confirm: false`. Different senders proceed
 * concurrently.
 */

import { normalizeAddress } from '../address'
import type { Session } from '../session'
import type { Receipt, SignedTransaction } from '../types/core'
import { shortHex, type BytesLike } from '../utils/bytes'
import { attachSignature, buildCallTx } from './build'
import { ConfirmationPoller, type Confirmation } from './confirm'
import { signBytesHex } from './encode'

export type SubmitSession = Pick<Session, 'config' | 'node' | 'signer' | 'locks' | 'log'>

export interface SubmitParams {
  sender: string
  /** Omit or '' to create a contract. */
  recipient?: string
  payload: BytesLike
  fee?: bigint
  gasLimit?: bigint
  amount?: bigint
  /** Wait for the next block before releasing the sender. Default: true. */
  confirm?: boolean
  /** Cancels the confirmation wait. */
  signal?: AbortSignal
  /**
   * Runs after the node accepted the transaction and before confirmation,
   * still under the sender lock. A rejection aborts the flow.
   */
  onBroadcast?: (submitted: Submitted) => Promise<void> | void
}

export interface Submitted {
  signed: SignedTransaction
  receipt: Receipt
  /** Uppercase hex handed to the signer. */
  signBytes: string
}

export interface SubmitResult extends Submitted {
  confirmation?: Confirmation
}

export async function signAndSubmit(session: SubmitSession, params: SubmitParams): Promise<SubmitResult> {
  const sender = normalizeAddress(params.sender, 'sender')
  const { config, node, signer, log } = session

  return session.locks.run(`sender:${sender}`, async () => {
    const account = await node.getAccount(sender)
    const tx = buildCallTx({
      account,
      recipient: params.recipient,
      payload: params.payload,
      fee: params.fee ?? config.tx.fee,
      gasLimit: params.gasLimit ?? config.tx.gasLimit,
      amount: params.amount ?? config.tx.amount
    })
    const signBytes = signBytesHex(config.chainId, tx)
    log.debug('sign bytes', { sender, sequence: tx.sequence.toString(), signBytes: shortHex(signBytes, 16, 8) })

    const signature = await signer.sign(signBytes, sender)
    const publicKey = await signer.publicKey(sender)
    const signed = attachSignature(tx, { publicKey, signature })

    const receipt = await node.broadcastTx(signed)
    log.info('broadcast', {
      sender,
      sequence: tx.sequence.toString(),
      recipient: tx.recipient || '(create)',
      contractAddress: receipt.contractAddress
    })

    const submitted: Submitted = { signed, receipt, signBytes }
    if (params.onBroadcast) await params.onBroadcast(submitted)
    if (params.confirm === false) return submitted

    const confirmation = await new ConfirmationPoller(node, {
      pollIntervalMs: config.confirmation.pollIntervalMs,
      timeoutMs: config.confirmation.timeoutMs,
      signal: params.signal,
      log: log.child('confirm')
    }).wait()
    return { ...submitted, confirmation }
  })
}
