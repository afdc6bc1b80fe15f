/**
 * Contract deployment.
 *
 *   compile → sign & submit create tx → record ABI/deployer/bytecode → record address
 *           → await next block → read stored code → verify
 *
 * Registry writes happen only once the node accepted the transaction. If the
 * confirmation wait times out, the record (address included) is already on
 * disk and `resumeDeployment` can finish the check later.
 */

import { parseContractSource } from '../compiler/client'
import { BroadcastError, RegistryError } from '../errors'
import type { Session } from '../session'
import { signAndSubmit } from '../tx/send'
import { waitForNextBlock, type Confirmation } from '../tx/confirm'
import type { CompiledArtifact, ContractRecord, ContractSource, Receipt } from '../types/core'
import { verifyBytecode, type VerificationResult } from './verify'

export interface DeployOptions {
  /** Deployer account; signs the create transaction. */
  from: string
  /** Compile-server language tag. Default: 'sol'. */
  language?: string
  fee?: bigint
  gasLimit?: bigint
  amount?: bigint
  /** Cancels the confirmation wait. */
  signal?: AbortSignal
}

export interface DeployResult {
  record: ContractRecord
  artifact: CompiledArtifact
  receipt: Receipt
  confirmation?: Confirmation
  verification: VerificationResult
}

export async function deployContract(
  session: Session,
  source: string | ContractSource,
  opts: DeployOptions
): Promise<DeployResult> {
  const { name, code } = typeof source === 'string' ? parseContractSource(source) : source
  const log = session.log.child('deploy')

  const artifact = await session.compiler.compile({ name, language: opts.language, source: code })

  const written: { record?: ContractRecord } = {}
  const result = await signAndSubmit(session, {
    sender: opts.from,
    recipient: '',
    payload: artifact.bytecode,
    fee: opts.fee,
    gasLimit: opts.gasLimit,
    amount: opts.amount,
    signal: opts.signal,
    onBroadcast: async ({ receipt }) => {
      const address = receipt.contractAddress
      if (!address) {
        const reason = 'receipt carries no contract address'
        throw new BroadcastError(`Create transaction for ${name} accepted but ${reason}`, {
          reason,
          data: receipt
        })
      }
      written.record = await session.locks.run(`contract:${name}`, async () => {
        await session.registry.put({
          contractName: name,
          abi: artifact.abi,
          deployerAddress: opts.from,
          bytecode: artifact.bytecodeHex
        })
        return session.registry.setDeployedAddress(name, address)
      })
      log.info(`${name} pending at ${address}`)
    }
  })

  const record = written.record
  if (!record?.deployedAddress) throw new RegistryError(`Record for ${name} was not written`)
  const verification = verifyBytecode(await session.node.getCode(record.deployedAddress), artifact.bytecode)
  reportVerification(session, name, verification)
  return { record, artifact, receipt: result.receipt, confirmation: result.confirmation, verification }
}

export interface ResumeOptions {
  /** Wait for one more block before reading the code. Default: false. */
  waitForBlock?: boolean
  signal?: AbortSignal
}

export interface ResumeResult {
  record: ContractRecord
  confirmation?: Confirmation
  verification: VerificationResult
}

/** Re-check a recorded deployment whose verification did not complete. */
export async function resumeDeployment(session: Session, name: string, opts: ResumeOptions = {}): Promise<ResumeResult> {
  const record = await session.registry.get(name)
  if (!record.deployedAddress) throw new RegistryError(`Contract "${name}" has no deployed address to verify`)
  if (!record.bytecode) throw new RegistryError(`Contract "${name}" has no recorded bytecode to verify against`)

  const confirmation = opts.waitForBlock
    ? await waitForNextBlock(session.node, {
        pollIntervalMs: session.config.confirmation.pollIntervalMs,
        timeoutMs: session.config.confirmation.timeoutMs,
        signal: opts.signal,
        log: session.log.child('confirm')
      })
    : undefined

  const verification = verifyBytecode(await session.node.getCode(record.deployedAddress), record.bytecode)
  reportVerification(session, name, verification)
  return { record, confirmation, verification }
}

function reportVerification(session: Session, name: string, v: VerificationResult): void {
  const log = session.log.child('verify')
  if (v.ok) {
    log.info(`${name}: deployed code found at byte ${v.offset ?? 0} of submitted bytecode`)
  } else {
    log.warn(`${name}: deployed code does not match submitted bytecode`, {
      deployed: v.deployed.slice(0, 64),
      submittedBytes: v.submitted.length / 2
    })
  }
}
