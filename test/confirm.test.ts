import { getEventListeners } from 'node:events'
import { describe, expect, test } from 'vitest'
import { ChainQueryError, ConfirmationTimeout } from '../src/errors'
import { ConfirmationPoller, waitForNextBlock, type HeightSource } from '../src/tx/confirm'

/** Replays `script` (numbers are heights, Errors are thrown); repeats the last entry. */
class ScriptedHeights implements HeightSource {
  calls = 0

  constructor(private readonly script: Array<number | Error>) {}

  async getLatestHeight(): Promise<number> {
    const step = this.script[Math.min(this.calls, this.script.length - 1)]
    this.calls++
    if (step instanceof Error) throw step
    return step
  }
}

const scripted = (script: Array<number | Error>) => new ScriptedHeights(script)

describe('ConfirmationPoller', () => {
  test('confirms at the first height above the start height', async () => {
    const src = scripted([5, 5, 5, 6])
    const poller = new ConfirmationPoller(src, { pollIntervalMs: 1, timeoutMs: 2_000 })
    expect(poller.state).toBe('start')
    const c = await poller.wait()
    expect(c.startHeight).toBe(5)
    expect(c.height).toBe(6)
    expect(c.polls).toBe(4)
    expect(src.calls).toBe(4)
    expect(poller.state).toBe('confirmed')
  })

  test('times out when the height never moves', async () => {
    const poller = new ConfirmationPoller(scripted([5]), { pollIntervalMs: 5, timeoutMs: 60 })
    const err = await poller.wait().catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ConfirmationTimeout)
    if (err instanceof ConfirmationTimeout) {
      expect(err.reason).toBe('deadline')
      expect(err.startHeight).toBe(5)
      expect(err.lastHeight).toBe(5)
    }
    expect(poller.state).toBe('timeout')
  })

  test('retries transient query errors', async () => {
    const src = scripted([new ChainQueryError('node busy'), 5, new ChainQueryError('node busy'), 6])
    const c = await waitForNextBlock(src, {
      pollIntervalMs: 1,
      timeoutMs: 2_000,
      backoff: { minDelay: 1, jitter: 'none' }
    })
    expect(c).toMatchObject({ startHeight: 5, height: 6 })
    expect(src.calls).toBe(4)
  })

  test('ends with reason "cancelled" when aborted', async () => {
    const ctl = new AbortController()
    const pending = waitForNextBlock(scripted([7]), { pollIntervalMs: 5, timeoutMs: 5_000, signal: ctl.signal })
    setTimeout(() => ctl.abort(), 20)
    const err = await pending.catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ConfirmationTimeout)
    if (err instanceof ConfirmationTimeout) expect(err.reason).toBe('cancelled')
  })

  test('leaves no abort listener on the caller signal after confirming', async () => {
    const ctl = new AbortController()
    await waitForNextBlock(scripted([1, 2]), { pollIntervalMs: 1, timeoutMs: 2_000, signal: ctl.signal })
    await waitForNextBlock(scripted([3, 4]), { pollIntervalMs: 1, timeoutMs: 2_000, signal: ctl.signal })
    expect(getEventListeners(ctl.signal, 'abort')).toHaveLength(0)
  })

  test('propagates errors that are not chain query failures', async () => {
    await expect(waitForNextBlock(scripted([new TypeError('bug')]), { pollIntervalMs: 1 })).rejects.toThrow('bug')
  })

  test('is single use', async () => {
    const poller = new ConfirmationPoller(scripted([1, 2]), { pollIntervalMs: 1 })
    await poller.wait()
    await expect(poller.wait()).rejects.toThrow(/already used/)
  })
})
