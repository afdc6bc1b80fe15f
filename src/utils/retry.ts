/**
 * Retry helpers with exponential backoff, jitter, AbortSignal support and per-attempt timeouts.
 *
 * Exports:
 *  - sleep(ms, signal)
 *  - backoffDelay(attempt, opts)
 *  - retryAsync(fn, opts)
 *  - fetchWithRetry(url, init?, opts?)
 *  - mergeSignals(signals) → { signal, dispose }
 */

export type JitterMode = 'none' | 'full'

export interface BackoffOptions {
  /** Base delay (ms) for the first retry attempt. Default: 200ms */
  minDelay?: number
  /** Exponential factor. Default: 2 */
  factor?: number
  /** Cap for delay (ms). Default: 10_000ms */
  maxDelay?: number
  /** Jitter strategy. Default: 'full' */
  jitter?: JitterMode
}

export interface RetryOptions extends BackoffOptions {
  /** Total number of retries (not counting the initial attempt). Default: 5 */
  retries?: number
  /** Hard timeout per attempt (ms). If elapsed, the attempt aborts with AbortError. */
  attemptTimeoutMs?: number
  /** An AbortSignal to cancel the whole retry loop. */
  signal?: AbortSignal
}

export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortError'
  }
}

/** Abortable sleep */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortError())
  if (ms <= 0) return Promise.resolve()
  return new Promise((resolve, reject) => {
    const t = setTimeout(done, ms)
    function done() {
      cleanup()
      resolve()
    }
    function onAbort() {
      cleanup()
      reject(new AbortError())
    }
    function cleanup() {
      clearTimeout(t)
      signal?.removeEventListener('abort', onAbort)
    }
    signal?.addEventListener('abort', onAbort)
  })
}

/** Compute backoff delay (ms) for attempt number (1-based) */
export function backoffDelay(attempt: number, opts?: BackoffOptions): number {
  const factor = opts?.factor ?? 2
  const min = opts?.minDelay ?? 200
  const max = opts?.maxDelay ?? 10_000
  const jitter = opts?.jitter ?? 'full'
  const base = Math.min(max, Math.floor(min * Math.pow(factor, Math.max(0, attempt - 1))))
  if (jitter === 'none') return base
  // full jitter: uniform in [0, base]
  return Math.floor(Math.random() * (base + 1))
}

/**
 * Retry an async factory `fn` up to `retries` times on failure.
 * The factory receives (attempt, signal) where attempt starts at 1.
 */
export async function retryAsync<T>(
  fn: (attempt: number, signal: AbortSignal) => Promise<T>,
  opts?: RetryOptions
): Promise<T> {
  const retries = opts?.retries ?? 5
  const globalSignal = opts?.signal

  for (let attempt = 1; ; attempt++) {
    if (globalSignal?.aborted) throw new AbortError()

    const ctl = new AbortController()
    const onAbort = () => ctl.abort(new AbortError())
    globalSignal?.addEventListener('abort', onAbort)
    const timer =
      opts?.attemptTimeoutMs && opts.attemptTimeoutMs > 0
        ? setTimeout(() => ctl.abort(new AbortError('Attempt timed out')), opts.attemptTimeoutMs)
        : undefined
    const cleanup = () => {
      if (timer !== undefined) clearTimeout(timer)
      globalSignal?.removeEventListener('abort', onAbort)
    }

    try {
      const res = await fn(attempt, ctl.signal)
      cleanup()
      return res
    } catch (err) {
      cleanup()

      // Caller cancellation: never retry
      if (globalSignal?.aborted) throw err

      if (attempt > retries || !defaultRetryPredicate(err)) throw err
      await sleep(backoffDelay(attempt, opts), globalSignal)
    }
  }
}

/** Default retry predicate: network failures, timeouts and 408/429/5xx. */
export function defaultRetryPredicate(err: unknown): boolean {
  // fetch rejects with TypeError on network failure
  if (err instanceof TypeError) return true
  if (err instanceof AbortError) return true // per-attempt timeout
  if (err instanceof HttpError) return isRetryableStatus(err.status)
  return false
}

function isRetryableStatus(s: number): boolean {
  return s === 408 || s === 429 || (s >= 500 && s <= 599)
}

/** Non-OK HTTP response, with the body kept for diagnostics. */
export class HttpError extends Error {
  readonly status: number
  readonly statusText: string
  readonly bodyText?: string

  constructor(message: string, status: number, statusText: string, bodyText?: string) {
    super(message)
    this.name = 'HttpError'
    this.status = status
    this.statusText = statusText
    this.bodyText = bodyText
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

/** Options specific to fetchWithRetry */
export interface FetchRetryOptions extends RetryOptions {
  /** fetch implementation; defaults to the global one. */
  fetchImpl?: FetchLike
}

/**
 * fetchWithRetry: retries transient HTTP failures (408, 429, 5xx, network) with backoff.
 * Returns a successful Response (ok=true) or throws HttpError for non-OK responses.
 */
export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchRetryOptions): Promise<Response> {
  const method = (init?.method ?? 'GET').toUpperCase()
  const doFetch: FetchLike = opts?.fetchImpl ?? ((input, reqInit) => fetch(input, reqInit))
  const merged = mergeSignals([opts?.signal, init?.signal ?? undefined])

  try {
    return await retryAsync<Response>(
      async (_attempt, signal) => {
        const response = await doFetch(url, { ...init, signal })
        if (response.ok) return response
        let bodyText: string | undefined
        try {
          bodyText = await response.text()
        } catch {
          bodyText = undefined
        }
        throw new HttpError(`HTTP ${response.status} ${response.statusText}`, response.status, response.statusText, bodyText)
      },
      {
        ...opts,
        signal: merged.signal,
        // POSTs submit transactions or ask for signatures; they are sent once
        retries: method === 'GET' || method === 'HEAD' ? opts?.retries : 0
      }
    )
  } finally {
    merged.dispose()
  }
}

export interface MergedSignal {
  /** Aborts when any input aborts; undefined when there were no inputs. */
  signal: AbortSignal | undefined
  /** Detaches the listeners added to the inputs. */
  dispose(): void
}

/** Merge AbortSignals into one. Call `dispose` when done with it. */
export function mergeSignals(signals: Array<AbortSignal | undefined>): MergedSignal {
  const list = [...new Set(signals.filter((s): s is AbortSignal => s !== undefined))]
  if (list.length <= 1) return { signal: list[0], dispose: () => {} }
  const ctl = new AbortController()
  const onAbort = () => ctl.abort(new AbortError())
  const dispose = () => {
    for (const s of list) s.removeEventListener('abort', onAbort)
  }
  for (const s of list) {
    if (s.aborted) {
      dispose()
      ctl.abort(new AbortError())
      return { signal: ctl.signal, dispose }
    }
    s.addEventListener('abort', onAbort)
  }
  return { signal: ctl.signal, dispose }
}
