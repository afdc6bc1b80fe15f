/**
 * Node RPC envelope.
 *
 * Every node endpoint (GET URI-style queries and POSTed JSON-RPC alike) answers with
 *
 *   { "jsonrpc": "2.0", "id": "", "result": [<type tag>, <body>], "error": "" }
 *
 * A non-empty `error` (a string, or a JSON-RPC error object on some versions)
 * means the request failed; otherwise `result[1]` is the body.
 */

import { z } from 'zod'
import { formatZodError } from '../utils/schema'

export const RpcErrorObject = z
  .object({
    code: z.number().optional(),
    message: z.string().optional(),
    data: z.unknown().optional()
  })
  .passthrough()

export const RpcEnvelope = z.object({
  jsonrpc: z.string().optional(),
  id: z.unknown().optional(),
  result: z.tuple([z.number(), z.unknown()]).nullable().optional(),
  error: z.union([z.string(), RpcErrorObject, z.null()]).optional()
})
export type RpcEnvelope = z.output<typeof RpcEnvelope>

export type Unwrapped =
  | { ok: true; body: unknown }
  | { ok: false; message: string; code?: number; data?: unknown }

/** Split an envelope into its body or its error message. */
export function unwrapEnvelope(json: unknown): Unwrapped {
  const r = RpcEnvelope.safeParse(json)
  if (!r.success) return { ok: false, message: `Malformed RPC envelope: ${formatZodError(r.error)}` }
  const env = r.data
  const err = env.error
  if (typeof err === 'string' && err.length > 0) return { ok: false, message: err }
  if (err && typeof err === 'object') {
    return { ok: false, message: err.message ?? 'RPC error', code: err.code, data: err.data }
  }
  if (!env.result) return { ok: false, message: 'RPC envelope has neither result nor error' }
  return { ok: true, body: env.result[1] }
}

/** JSON-RPC 2.0 request as POSTed to the node root. */
export interface JsonRpcRequest<P = unknown> {
  jsonrpc: '2.0'
  id: string
  method: string
  params: P
}

export function makeRequest<P>(method: string, params: P, id = ''): JsonRpcRequest<P> {
  return { jsonrpc: '2.0', id, method, params }
}
