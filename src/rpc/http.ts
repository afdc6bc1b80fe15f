/**
 * HTTP JSON transport (fetch-based) shared by the node, signer and compiler clients.
 *
 * Usage:
 *   const http = new HttpClient('http://localhost:46657', { retries: 3 })
 *   const status = await http.getJson('/status')
 *
 * Features:
 *  - Exponential backoff with jitter for GETs (network errors, 408/429/5xx)
 *  - POSTs are sent once: they submit transactions or ask for signatures
 *  - Per-attempt timeout and external AbortSignal
 *  - Injectable fetch for tests
 */

import { fetchWithRetry, type BackoffOptions, type FetchLike } from '../utils/retry'
import { userAgent } from '../version'

/** Options for the HTTP client. */
export interface HttpClientOptions {
  /** Per-attempt timeout (ms). Default: 15_000. */
  timeoutMs?: number
  /** Retries for GET requests (not counting the first attempt). Default: 3. */
  retries?: number
  /** Backoff tuning for GET retries. */
  backoff?: BackoffOptions
  /** fetch implementation; defaults to the global one. */
  fetch?: FetchLike
}

export interface RequestOptions {
  signal?: AbortSignal
  timeoutMs?: number
}

/** Query values are sent as-is; callers quote them when the server expects it. */
export type Query = Record<string, string>

export class HttpClient {
  readonly baseUrl: string
  private readonly headers: Record<string, string>
  private readonly timeoutMs: number
  private readonly retries: number
  private readonly backoff: BackoffOptions
  private readonly fetchImpl?: FetchLike

  constructor(baseUrl: string, opts?: HttpClientOptions) {
    this.baseUrl = normalizeUrl(baseUrl)
    this.headers = { accept: 'application/json', 'user-agent': userAgent() }
    this.timeoutMs = opts?.timeoutMs ?? 15_000
    this.retries = opts?.retries ?? 3
    this.backoff = opts?.backoff ?? {}
    this.fetchImpl = opts?.fetch
  }

  /** Absolute URL for `path` (relative to the base URL) plus query. */
  url(path = '', query?: Query): string {
    const u = new URL(this.baseUrl + path)
    for (const [k, v] of Object.entries(query ?? {})) u.searchParams.set(k, v)
    return u.toString()
  }

  async getJson(path: string, query?: Query, opts?: RequestOptions): Promise<unknown> {
    const url = this.url(path, query)
    const signal = opts?.signal
    const response = await fetchWithRetry(
      url,
      { method: 'GET', headers: this.headers, signal },
      {
        ...this.backoff,
        retries: this.retries,
        attemptTimeoutMs: opts?.timeoutMs ?? this.timeoutMs,
        signal,
        fetchImpl: this.fetchImpl
      }
    )
    return parseJson(response, url)
  }

  /** POST an already-serialised JSON body. Never retried. */
  async postJson(path: string, body: string, opts?: RequestOptions): Promise<unknown> {
    const url = this.url(path)
    const signal = opts?.signal
    const response = await fetchWithRetry(
      url,
      {
        method: 'POST',
        headers: { ...this.headers, 'content-type': 'application/json' },
        body,
        signal
      },
      {
        retries: 0,
        attemptTimeoutMs: opts?.timeoutMs ?? this.timeoutMs,
        signal,
        fetchImpl: this.fetchImpl
      }
    )
    return parseJson(response, url)
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────────────────────────────────────

function normalizeUrl(u: string): string {
  if (!/^https?:\/\//i.test(u)) throw new Error(`Invalid URL (expected http/https): ${u}`)
  return u.replace(/\/+$/, '')
}

async function parseJson(res: Response, url: string): Promise<unknown> {
  const text = await res.text()
  if (text.trim() === '') throw new SyntaxError(`Empty response body from ${url}`)
  try {
    return JSON.parse(text)
  } catch {
    throw new SyntaxError(`Invalid JSON from ${url}: ${text.slice(0, 200)}`)
  }
}
