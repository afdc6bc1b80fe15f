import { describe, expect, test } from 'vitest'
import { KeyedLock } from '../src/utils/lock'
import { sleep } from '../src/utils/retry'

describe('KeyedLock', () => {
  test('runs tasks on the same key one after another', async () => {
    const lock = new KeyedLock()
    const order: string[] = []
    await Promise.all([
      lock.run('k', async () => {
        order.push('a:start')
        await sleep(20)
        order.push('a:end')
      }),
      lock.run('k', async () => {
        order.push('b:start')
        order.push('b:end')
      })
    ])
    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end'])
    expect(lock.size).toBe(0)
  })

  test('lets different keys overlap', async () => {
    const lock = new KeyedLock()
    const order: string[] = []
    await Promise.all([
      lock.run('a', async () => {
        await sleep(20)
        order.push('a')
      }),
      lock.run('b', async () => {
        order.push('b')
      })
    ])
    expect(order).toEqual(['b', 'a'])
  })

  test('a failed task does not block the key', async () => {
    const lock = new KeyedLock()
    await expect(lock.run('k', async () => Promise.reject(new Error('nope')))).rejects.toThrow('nope')
    await expect(lock.run('k', async () => 42)).resolves.toBe(42)
  })
})
