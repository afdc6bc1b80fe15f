/**
 * Confirmation by block height.
 *
 * The node offers no receipt lookup by hash, so a submitted transaction is
 * taken as committed once the chain height moves past the height observed
 * right after the broadcast:
 *
 *   start ──read H0──▶ polling ──H > H0──▶ confirmed
 *                         │
 *                         └──deadline / abort──▶ timeout (ConfirmationTimeout)
 *
 * ChainQueryErrors while reading the height are treated as transient and
 * retried with exponential backoff until the deadline.
 */

import { ChainQueryError, ConfirmationTimeout, type ConfirmationTimeoutReason } from '../errors'
import type { RequestOptions } from '../rpc/http'
import { logger, type ILogger } from '../utils/logger'
import { AbortError, backoffDelay, mergeSignals, sleep, type BackoffOptions } from '../utils/retry'

/** Anything that can report the latest committed height (NodeClient does). */
export interface HeightSource {
  getLatestHeight(opts?: RequestOptions): Promise<number>
}

export type PollerState = 'start' | 'polling' | 'confirmed' | 'timeout'

export interface ConfirmOptions {
  /** Delay between height reads (ms). Default: 500. */
  pollIntervalMs?: number
  /** Wall-clock bound for the whole wait (ms). Default: 60_000. */
  timeoutMs?: number
  /** Cancels the wait; ends in ConfirmationTimeout with reason 'cancelled'. */
  signal?: AbortSignal
  /** Backoff applied after failed height reads. */
  backoff?: BackoffOptions
  log?: ILogger
}

export interface Confirmation {
  startHeight: number
  height: number
  /** Number of height reads, including the initial one. */
  polls: number
  elapsedMs: number
}

export class ConfirmationPoller {
  private _state: PollerState = 'start'
  private readonly source: HeightSource
  private readonly interval: number
  private readonly timeoutMs: number
  private readonly signal?: AbortSignal
  private readonly backoff: BackoffOptions
  private readonly log: ILogger

  constructor(source: HeightSource, opts: ConfirmOptions = {}) {
    this.source = source
    this.interval = Math.max(0, opts.pollIntervalMs ?? 500)
    this.timeoutMs = Math.max(1, opts.timeoutMs ?? 60_000)
    this.signal = opts.signal
    this.backoff = opts.backoff ?? { minDelay: Math.max(50, this.interval), maxDelay: 5_000 }
    this.log = opts.log ?? logger('confirm')
  }

  get state(): PollerState {
    return this._state
  }

  /** Resolves at the first height strictly above the starting height. Single use. */
  async wait(): Promise<Confirmation> {
    if (this._state !== 'start') throw new Error(`ConfirmationPoller already used (state: ${this._state})`)
    this._state = 'polling'

    const t0 = Date.now()
    const deadline = new AbortController()
    const timer = setTimeout(() => deadline.abort(new AbortError('Confirmation deadline reached')), this.timeoutMs)
    const merged = mergeSignals([this.signal, deadline.signal])
    const signal = merged.signal ?? deadline.signal

    let startHeight: number | undefined
    let lastHeight: number | undefined
    let lastError: unknown
    let polls = 0
    let failures = 0

    const fail = (reason: ConfirmationTimeoutReason): ConfirmationTimeout => {
      this._state = 'timeout'
      const elapsedMs = Date.now() - t0
      const what = reason === 'cancelled' ? 'cancelled' : `no new block within ${this.timeoutMs}ms`
      return new ConfirmationTimeout(`Confirmation ${what} (start height ${startHeight ?? '?'}, last ${lastHeight ?? '?'})`, {
        reason,
        startHeight,
        lastHeight,
        elapsedMs,
        cause: lastError
      })
    }

    try {
      for (;;) {
        if (signal.aborted) throw fail(this.signal?.aborted ? 'cancelled' : 'deadline')
        try {
          const h = await this.source.getLatestHeight({ signal })
          polls++
          failures = 0
          lastHeight = h
          if (startHeight === undefined) {
            startHeight = h
            this.log.debug('start height', h)
          } else if (h > startHeight) {
            this._state = 'confirmed'
            const elapsedMs = Date.now() - t0
            this.log.info('confirmed', { startHeight, height: h, polls, elapsedMs })
            return { startHeight, height: h, polls, elapsedMs }
          }
          await sleep(this.interval, signal)
        } catch (e) {
          if (signal.aborted) throw fail(this.signal?.aborted ? 'cancelled' : 'deadline')
          if (!(e instanceof ChainQueryError)) throw e
          lastError = e
          failures++
          const delay = backoffDelay(failures, this.backoff)
          this.log.warn(`height read failed (attempt ${failures}), retrying in ${delay}ms:`, e.message)
          try {
            await sleep(delay, signal)
          } catch {
            throw fail(this.signal?.aborted ? 'cancelled' : 'deadline')
          }
        }
      }
    } finally {
      clearTimeout(timer)
      merged.dispose()
      if (this._state === 'polling') this._state = 'timeout'
    }
  }
}

/** One-shot helper. */
export function waitForNextBlock(source: HeightSource, opts: ConfirmOptions = {}): Promise<Confirmation> {
  return new ConfirmationPoller(source, opts).wait()
}
