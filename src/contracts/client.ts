/**
 * ABI-based client for a deployed contract.
 *
 * Responsibilities:
 *  - Hold a registry record (address + ABI)
 *  - Encode call data / decode return data
 *  - `transact`: sign → broadcast → await block; read-only functions then have
 *    their result read with a simulated call against the confirmed state
 *  - `simulate`: run the call on the node without a transaction
 */

import { normalizeAddress } from '../address'
import { RegistryError } from '../errors'
import type { Session } from '../session'
import { signAndSubmit, type SubmitResult } from '../tx/send'
import { isReadOnly, type Abi } from '../types/abi'
import type { ContractRecord } from '../types/core'
import { toWireHex } from '../utils/bytes'
import { decodeReturn, encodeCall, findFunction, type AbiValue, type DecodedValue } from './calldata'

export type ReturnValue = DecodedValue | DecodedValue[] | undefined

export interface TransactOptions {
  /** Sender; defaults to the account that deployed the contract. */
  from?: string
  fee?: bigint
  gasLimit?: bigint
  amount?: bigint
  signal?: AbortSignal
}

export interface TransactResult extends SubmitResult {
  /** Set for read-only functions; undefined for state-changing ones. */
  value: ReturnValue
}

export class Contract {
  readonly name: string
  readonly address: string
  readonly abi: Abi
  readonly deployer: string
  private readonly session: Session

  constructor(session: Session, record: ContractRecord) {
    if (!record.deployedAddress) {
      throw new RegistryError(`Contract "${record.contractName}" has no deployed address yet`)
    }
    this.session = session
    this.name = record.contractName
    this.address = normalizeAddress(record.deployedAddress, 'deployedAddress')
    this.abi = record.abi
    this.deployer = normalizeAddress(record.deployerAddress, 'deployerAddress')
  }

  /** Look `name` up in the session's registry. */
  static async load(session: Session, name: string): Promise<Contract> {
    return new Contract(session, await session.registry.get(name))
  }

  encode(fn: string, args: readonly AbiValue[] = []): Uint8Array {
    return encodeCall(this.abi, fn, args)
  }

  decode(fn: string, returnHex: string, argCount?: number): ReturnValue {
    return decodeReturn(this.abi, fn, returnHex, argCount)
  }

  /** Execute on the node without a transaction and decode the result. */
  async simulate(fn: string, args: readonly AbiValue[] = [], opts: { from?: string } = {}): Promise<ReturnValue> {
    const data = toWireHex(this.encode(fn, args))
    const { returnHex } = await this.session.node.simulateCall({
      from: opts.from ?? this.deployer,
      to: this.address,
      data
    })
    this.session.log.debug(`${this.name}.${fn} simulated`, { returnHex })
    return this.decode(fn, returnHex, args.length)
  }

  async transact(fn: string, args: readonly AbiValue[] = [], opts: TransactOptions = {}): Promise<TransactResult> {
    const entry = findFunction(this.abi, fn, args.length)
    const from = opts.from ?? this.deployer
    const result = await signAndSubmit(this.session, {
      sender: from,
      recipient: this.address,
      payload: this.encode(fn, args),
      fee: opts.fee,
      gasLimit: opts.gasLimit,
      amount: opts.amount,
      signal: opts.signal
    })
    const value = isReadOnly(entry) ? await this.simulate(fn, args, { from }) : undefined
    return { ...result, value }
  }
}
