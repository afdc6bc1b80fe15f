/* In-process stand-ins shared by the unit tests: a recording fetch and
 * helpers for the node's response envelope. */

import type { FetchLike } from '../src/utils/retry'

export interface RecordedRequest {
  url: URL
  method: string
  body?: string
}

export type FakeHandler = (req: RecordedRequest, index: number) => Response | Promise<Response>

/** fetch replacement that records every request and answers through `handler`. */
export function fakeFetch(handler: FakeHandler): { fetch: FetchLike; calls: RecordedRequest[] } {
  const calls: RecordedRequest[] = []
  const fetch: FetchLike = async (input, init) => {
    const req: RecordedRequest = {
      url: new URL(input),
      method: init?.method ?? 'GET',
      body: typeof init?.body === 'string' ? init.body : undefined
    }
    calls.push(req)
    return handler(req, calls.length - 1)
  }
  return { fetch, calls }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })
}

/** Node envelope around a successful result body. */
export function envelope(body: unknown, tag = 0): unknown {
  return { jsonrpc: '2.0', id: '', result: [tag, body], error: '' }
}

export function errorEnvelope(message: string): unknown {
  return { jsonrpc: '2.0', id: '', result: null, error: message }
}

/** 32-byte big-endian word as lowercase hex. */
export function word(n: bigint): string {
  return n.toString(16).padStart(64, '0')
}

export const DEPLOYER = '1234567890ABCDEF1234567890ABCDEF12345678'
export const CONTRACT = 'C0FFEE0000000000000000000000000000000001'
