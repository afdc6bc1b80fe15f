/**
 * Node RPC client: chain state reads and transaction broadcast.
 *
 * Endpoints (URI args are JSON-quoted, as the node's URI handler expects):
 *   GET  /status                                   → latest_block_height
 *   GET  /genesis                                  → genesis.chain_id
 *   GET  /get_account?address="<ADDR>"             → account { sequence, code } | null
 *   GET  /call?fromAddress=".."&toAddress=".."&data=".."  → return
 *   POST /  {"jsonrpc":"2.0","id":"","method":"broadcast_tx","params":[<tx>]}
 *
 * Read failures raise ChainQueryError and are never defaulted; broadcast
 * failures raise BroadcastError carrying the node's reason.
 */

import { z } from 'zod'
import { normalizeAddress } from '../address'
import { BroadcastError, ChainQueryError, ensureError } from '../errors'
import type { AccountState, Receipt, SignedTransaction } from '../types/core'
import { encodeSignedTx } from '../tx/encode'
import { encodeCanonicalJson } from '../utils/canonical'
import { logger, type ILogger } from '../utils/logger'
import { HttpError } from '../utils/retry'
import { UIntBig, UIntNumber, WireHex, formatZodError } from '../utils/schema'
import { HttpClient, type HttpClientOptions, type Query, type RequestOptions } from './http'
import { makeRequest, unwrapEnvelope } from './index'

// ──────────────────────────────────────────────────────────────────────────────
// Response bodies
// ──────────────────────────────────────────────────────────────────────────────

const StatusBody = z
  .object({
    latest_block_height: UIntNumber,
    latest_block_hash: z.string().optional()
  })
  .passthrough()

const GenesisBody = z.object({
  genesis: z.object({ chain_id: z.string().min(1) }).passthrough()
})

const AccountBody = z.object({
  account: z
    .object({
      address: z.string().optional(),
      sequence: UIntBig,
      code: z.union([WireHex, z.null()]).optional()
    })
    .passthrough()
    .nullable()
})

const CallBody = z
  .object({
    return: z.union([WireHex, z.null()]).optional(),
    gas_used: z.number().optional()
  })
  .passthrough()

const BroadcastBody = z.object({
  receipt: z
    .object({
      tx_hash: z.string().optional(),
      creates_contract: z.union([z.boolean(), z.number()]).optional(),
      contract_addr: z.string().optional()
    })
    .passthrough()
})

export interface NodeStatus {
  latestBlockHeight: number
  latestBlockHash?: string
}

export interface SimulateCallParams {
  from: string
  to: string
  /** Call data as hex. */
  data: string
}

export interface SimulateCallResult {
  /** Uppercase hex of the return data (may be empty). */
  returnHex: string
  gasUsed?: number
}

// ──────────────────────────────────────────────────────────────────────────────
// Client
// ──────────────────────────────────────────────────────────────────────────────

export class NodeClient {
  readonly http: HttpClient
  private readonly log: ILogger

  constructor(baseUrl: string | HttpClient, opts?: HttpClientOptions & { log?: ILogger }) {
    this.http = typeof baseUrl === 'string' ? new HttpClient(baseUrl, opts) : baseUrl
    this.log = opts?.log ?? logger('node')
  }

  async getStatus(opts?: RequestOptions): Promise<NodeStatus> {
    const body = await this.query('/status', undefined, StatusBody, opts)
    return { latestBlockHeight: body.latest_block_height, latestBlockHash: body.latest_block_hash }
  }

  async getLatestHeight(opts?: RequestOptions): Promise<number> {
    return (await this.getStatus(opts)).latestBlockHeight
  }

  async getGenesis(opts?: RequestOptions): Promise<{ chainId: string; genesis: Record<string, unknown> }> {
    const body = await this.query('/genesis', undefined, GenesisBody, opts)
    return { chainId: body.genesis.chain_id, genesis: body.genesis }
  }

  /** Account state; an address that never transacted reads as sequence 0 with no code. */
  async getAccount(address: string, opts?: RequestOptions): Promise<AccountState> {
    const addr = normalizeAddress(address)
    const body = await this.query('/get_account', { address: quote(addr) }, AccountBody, opts)
    if (body.account === null) {
      this.log.debug('account not found, treating as fresh', addr)
      return { address: addr, sequence: 0n, code: '' }
    }
    return {
      address: addr,
      sequence: body.account.sequence,
      code: (body.account.code ?? '').toUpperCase()
    }
  }

  async getSequence(address: string, opts?: RequestOptions): Promise<bigint> {
    return (await this.getAccount(address, opts)).sequence
  }

  /** Code stored at `address`, uppercase hex; empty when there is none. */
  async getCode(address: string, opts?: RequestOptions): Promise<string> {
    return (await this.getAccount(address, opts)).code
  }

  /** Execute a call against current state without creating a transaction. */
  async simulateCall(params: SimulateCallParams, opts?: RequestOptions): Promise<SimulateCallResult> {
    const query = {
      fromAddress: quote(normalizeAddress(params.from, 'from')),
      toAddress: quote(normalizeAddress(params.to, 'to')),
      data: quote(params.data.replace(/^0x/i, '').toUpperCase())
    }
    const body = await this.query('/call', query, CallBody, opts)
    return { returnHex: (body.return ?? '').toUpperCase(), gasUsed: body.gas_used }
  }

  /** Submit a signed transaction. Not retried: a resend could double-spend the sequence. */
  async broadcastTx(signed: SignedTransaction, opts?: RequestOptions): Promise<Receipt> {
    const endpoint = this.http.url('/')
    const payload = encodeCanonicalJson(makeRequest('broadcast_tx', [encodeSignedTx(signed)]))

    let json: unknown
    try {
      json = await this.http.postJson('/', payload, opts)
    } catch (e) {
      const reason = transportReason(e)
      throw new BroadcastError(`broadcast_tx failed: ${reason}`, { reason, cause: e, context: { endpoint } })
    }

    const unwrapped = unwrapEnvelope(json)
    if (!unwrapped.ok) {
      throw new BroadcastError(`Node rejected transaction: ${unwrapped.message}`, {
        reason: unwrapped.message,
        code: unwrapped.code,
        data: unwrapped.data,
        context: { endpoint, sequence: signed.tx.sequence.toString() }
      })
    }
    const r = BroadcastBody.safeParse(unwrapped.body)
    if (!r.success) {
      const reason = `unexpected broadcast response: ${formatZodError(r.error)}`
      throw new BroadcastError(reason, { reason, data: unwrapped.body, context: { endpoint } })
    }

    // `creates_contract` is optional; some nodes send `contract_addr` alone
    const receipt = r.data.receipt
    const contractAddress = receipt.contract_addr ? receipt.contract_addr.toUpperCase() : undefined
    const createsContract =
      receipt.creates_contract === undefined
        ? contractAddress !== undefined || signed.tx.recipient === ''
        : Boolean(receipt.creates_contract)
    this.log.debug('broadcast accepted', { txHash: receipt.tx_hash, contractAddress })
    return {
      txHash: receipt.tx_hash ? receipt.tx_hash.toUpperCase() : undefined,
      contractAddress: createsContract ? contractAddress : undefined,
      createsContract
    }
  }

  // ────────────────────────────────────────────────────────────────────────────
  // Internals
  // ────────────────────────────────────────────────────────────────────────────

  private async query<S extends z.ZodTypeAny>(
    path: string,
    query: Query | undefined,
    schema: S,
    opts?: RequestOptions
  ): Promise<z.output<S>> {
    const endpoint = this.http.url(path, query)
    let json: unknown
    try {
      json = await this.http.getJson(path, query, opts)
    } catch (e) {
      throw new ChainQueryError(`${path} failed: ${transportReason(e)}`, {
        endpoint,
        cause: e,
        code: e instanceof HttpError ? e.status : undefined
      })
    }
    const unwrapped = unwrapEnvelope(json)
    if (!unwrapped.ok) {
      throw new ChainQueryError(`${path} returned an error: ${unwrapped.message}`, {
        endpoint,
        code: unwrapped.code,
        data: unwrapped.data
      })
    }
    const r = schema.safeParse(unwrapped.body)
    if (!r.success) {
      throw new ChainQueryError(`${path} returned an unexpected body: ${formatZodError(r.error)}`, {
        endpoint,
        data: unwrapped.body
      })
    }
    return r.data
  }
}

/** URI-style args are JSON strings: `address="ABCD…"`. */
function quote(v: string): string {
  return JSON.stringify(v)
}

function transportReason(e: unknown): string {
  if (e instanceof HttpError) return e.bodyText ? `${e.message}: ${e.bodyText.slice(0, 200)}` : e.message
  return ensureError(e).message
}
