/**
 * Compile-service client.
 *
 *   POST <compilerUrl> {"name": "<contract>", "language": "sol", "script": "<base64 source>"}
 *     → {"bytecode": "<base64>", "abi": <ABI | JSON string | double-escaped JSON string>, "error": ""}
 *
 * Some compile servers return the ABI as a JSON string whose quotes are escaped
 * a second time (`[{\"name\":…}]`). Exactly one corrective unescape pass is
 * applied before parsing; anything still unparseable is a CompileError.
 */

import { z } from 'zod'
import { CompileError, ensureError } from '../errors'
import { HttpClient, type HttpClientOptions, type RequestOptions } from '../rpc/http'
import { Abi } from '../types/abi'
import type { CompiledArtifact, ContractSource } from '../types/core'
import { base64ToBytes, bytesToBase64, toWireHex, utf8ToBytes } from '../utils/bytes'
import { logger, type ILogger } from '../utils/logger'
import { HttpError } from '../utils/retry'
import { formatZodError } from '../utils/schema'

export interface CompileRequest {
  name: string
  /** Source language tag understood by the compile server. Default: 'sol'. */
  language?: string
  /** Contract source text (sent base64-encoded). */
  source: string
}

const CompileResponse = z.object({
  bytecode: z.string().optional().default(''),
  abi: z.unknown().optional(),
  error: z.union([z.string(), z.null()]).optional()
})

/** Name following the first `contract` keyword in the source. */
export function parseContractSource(code: string): ContractSource {
  const m = /\bcontract\s+([A-Za-z_$][A-Za-z0-9_$]*)/.exec(stripComments(code))
  if (!m) throw new CompileError('No contract declaration found in source')
  return { name: m[1], code }
}

export class CompilerClient {
  readonly http: HttpClient
  private readonly log: ILogger

  constructor(url: string | HttpClient, opts?: HttpClientOptions & { log?: ILogger }) {
    this.http = typeof url === 'string' ? new HttpClient(url, opts) : url
    this.log = opts?.log ?? logger('compiler')
  }

  async compile(req: CompileRequest, opts?: RequestOptions): Promise<CompiledArtifact> {
    const endpoint = this.http.url()
    const context = { endpoint, contract: req.name }
    const body = JSON.stringify({
      name: req.name,
      language: req.language ?? 'sol',
      script: bytesToBase64(utf8ToBytes(req.source))
    })

    let json: unknown
    try {
      json = await this.log.measure(`compile ${req.name}`, () => this.http.postJson('', body, opts))
    } catch (e) {
      const detail = e instanceof HttpError && e.bodyText ? `${e.message}: ${e.bodyText.slice(0, 200)}` : ensureError(e).message
      throw new CompileError(`Compile request for ${req.name} failed: ${detail}`, { cause: e, context })
    }

    const r = CompileResponse.safeParse(json)
    if (!r.success) {
      throw new CompileError(`Malformed compile response: ${formatZodError(r.error)}`, { data: json, context })
    }
    if (r.data.error) throw new CompileError(`Compiler error: ${r.data.error}`, { data: json, context })

    let bytecode: Uint8Array
    try {
      bytecode = base64ToBytes(r.data.bytecode)
    } catch (e) {
      throw new CompileError('Compile response bytecode is not base64', { cause: e, data: json, context })
    }
    if (bytecode.length === 0) throw new CompileError(`Compiler returned no bytecode for ${req.name}`, { data: json, context })

    const abi = decodeAbi(r.data.abi, context)
    this.log.info('compiled', { contract: req.name, bytes: bytecode.length, entries: abi.length })
    return Object.freeze({ bytecode, bytecodeHex: toWireHex(bytecode), abi })
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// ABI normalisation
// ──────────────────────────────────────────────────────────────────────────────

/**
 * Accepts an ABI array, a JSON string of one, or a JSON string whose quotes
 * and backslashes carry one extra level of escaping.
 */
export function decodeAbi(raw: unknown, context: Record<string, unknown> = {}): Abi {
  let value = raw
  if (typeof value === 'string') value = parseAbiText(value.trim(), context)
  const r = Abi.safeParse(value)
  if (!r.success) throw new CompileError(`Invalid ABI: ${formatZodError(r.error)}`, { data: raw, context })
  if (r.data.length === 0) throw new CompileError('Compiler returned an empty ABI', { data: raw, context })
  return r.data
}

function parseAbiText(text: string, context: Record<string, unknown>): unknown {
  if (text === '') throw new CompileError('Compiler returned an empty ABI', { context })
  const first = tryParse(text)
  // A JSON string literal holding the ABI text: one more level to go.
  if (first.ok && typeof first.value !== 'string') return first.value
  const inner = first.ok && typeof first.value === 'string' ? first.value : unescapeOnce(text)
  const second = tryParse(inner)
  if (second.ok) return second.value
  throw new CompileError('ABI is not valid JSON after one unescape pass', { data: text, context })
}

function unescapeOnce(s: string): string {
  const unquoted = s.startsWith('"') && s.endsWith('"') ? s.slice(1, -1) : s
  return unquoted.replace(/\\(["\\/])/g, '$1')
}

function tryParse(s: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(s) }
  } catch {
    return { ok: false }
  }
}

function stripComments(code: string): string {
  return code.replace(/\/\*[\s\S]*?\*\//g, ' ').replace(/\/\/[^\n]*/g, ' ')
}
