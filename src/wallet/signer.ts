/**
 * Remote signer: private keys stay in an out-of-process key server.
 *
 *   POST /sign {"msg": "<HEX sign bytes>", "addr": "<ADDR>"} → {"Response": "<HEX signature>", "Error": ""}
 *   POST /pub  {"addr": "<ADDR>"}                            → {"Response": "<HEX public key>", "Error": ""}
 *
 * A non-empty `Error`, an empty `Response` or any transport failure becomes a
 * SigningError. Requests are sent once; callers decide whether to try again.
 */

import { z } from 'zod'
import { normalizeAddress } from '../address'
import { SigningError, ensureError } from '../errors'
import { HttpClient, type HttpClientOptions, type RequestOptions } from '../rpc/http'
import { logger, type ILogger } from '../utils/logger'
import { HttpError } from '../utils/retry'
import { formatZodError } from '../utils/schema'

// ──────────────────────────────────────────────────────────────────────────────
// Types & public API
// ──────────────────────────────────────────────────────────────────────────────

/** What the submit pipeline needs from a signer. */
export interface Signer {
  /** Sign hex-encoded sign bytes on behalf of `address`; returns the signature as uppercase hex. */
  sign(messageHex: string, address: string, opts?: RequestOptions): Promise<string>
  /** Public key of `address` as uppercase hex. */
  publicKey(address: string, opts?: RequestOptions): Promise<string>
}

const KeyServerResponse = z.object({
  Response: z.string().optional().default(''),
  Error: z.string().nullable().optional()
})

export class RemoteSigner implements Signer {
  readonly http: HttpClient
  private readonly log: ILogger
  private readonly pubKeys = new Map<string, string>()

  constructor(baseUrl: string | HttpClient, opts?: HttpClientOptions & { log?: ILogger }) {
    this.http = typeof baseUrl === 'string' ? new HttpClient(baseUrl, opts) : baseUrl
    this.log = opts?.log ?? logger('signer')
  }

  async sign(messageHex: string, address: string, opts?: RequestOptions): Promise<string> {
    const addr = normalizeAddress(address)
    const msg = messageHex.replace(/^0x/i, '').toUpperCase()
    if (msg.length === 0) throw new SigningError('Refusing to sign an empty message', { context: { address: addr } })
    const signature = await this.call('/sign', { msg, addr }, opts)
    this.log.debug('signed', { address: addr, bytes: msg.length / 2 })
    return signature
  }

  /** Cached per address for the lifetime of this signer; failures are not cached. */
  async publicKey(address: string, opts?: RequestOptions): Promise<string> {
    const addr = normalizeAddress(address)
    const cached = this.pubKeys.get(addr)
    if (cached !== undefined) return cached
    const pub = await this.call('/pub', { addr }, opts)
    this.pubKeys.set(addr, pub)
    return pub
  }

  private async call(path: string, body: Record<string, string>, opts?: RequestOptions): Promise<string> {
    const endpoint = this.http.url(path)
    let json: unknown
    try {
      json = await this.http.postJson(path, JSON.stringify(body), opts)
    } catch (e) {
      const detail = e instanceof HttpError && e.bodyText ? `${e.message}: ${e.bodyText.slice(0, 200)}` : ensureError(e).message
      throw new SigningError(`Key server ${path} failed: ${detail}`, {
        cause: e,
        code: e instanceof HttpError ? e.status : undefined,
        context: { endpoint, address: body.addr }
      })
    }

    const r = KeyServerResponse.safeParse(json)
    if (!r.success) {
      throw new SigningError(`Key server ${path} returned an unexpected body: ${formatZodError(r.error)}`, {
        data: json,
        context: { endpoint, address: body.addr }
      })
    }
    if (r.data.Error) {
      throw new SigningError(`Key server ${path} refused: ${r.data.Error}`, { context: { endpoint, address: body.addr } })
    }
    const out = r.data.Response.trim().replace(/^0x/i, '')
    if (out.length === 0 || !/^(?:[0-9a-fA-F]{2})+$/.test(out)) {
      throw new SigningError(`Key server ${path} returned no usable value`, {
        data: json,
        context: { endpoint, address: body.addr }
      })
    }
    return out.toUpperCase()
  }
}
