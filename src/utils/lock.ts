/**
 * KeyedLock: a promise chain per key. Tasks sharing a key run one after
 * another in submission order; tasks on different keys run concurrently.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>()

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve()
    let release: () => void = () => undefined
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = prev.then(() => current)
    this.tails.set(key, tail)

    await prev
    try {
      return await task()
    } finally {
      release()
      if (this.tails.get(key) === tail) this.tails.delete(key)
    }
  }

  /** Number of keys with a task queued or running. */
  get size(): number {
    return this.tails.size
  }
}
