export class MutexTimeoutError extends Error {
  readonly lockName: string | null
  readonly timeoutMs: number

  constructor(timeoutMs: number, lockName: string | null = null) {
    super(lockName ? `Timed out after ${timeoutMs}ms waiting for lock "${lockName}"` : `Timed out after ${timeoutMs}ms waiting for lock`)
    this.name = 'MutexTimeoutError'
    this.lockName = lockName
    this.timeoutMs = timeoutMs
  }
}

type Waiter = {
  resolve: () => void
  timer: NodeJS.Timeout | null
}

/**
 * FIFO async mutex. Ownership is handed directly to the next waiter on release,
 * so a caller that arrives between release and wake-up cannot jump the queue.
 */
export class Mutex {
  private locked = false
  private readonly queue: Waiter[] = []

  constructor(private readonly lockName: string | null = null) {}

  get isLocked(): boolean {
    return this.locked
  }

  get pending(): number {
    return this.queue.length
  }

  acquire(timeoutMs?: number): Promise<void> {
    if (!this.locked) {
      this.locked = true
      return Promise.resolve()
    }
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, timer: null }
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.queue.indexOf(waiter)
          if (index >= 0) this.queue.splice(index, 1)
          reject(new MutexTimeoutError(timeoutMs, this.lockName))
        }, timeoutMs)
      }
      this.queue.push(waiter)
    })
  }

  release(): void {
    if (!this.locked) {
      throw new Error('Trying to release non-locked mutex')
    }
    const next = this.queue.shift()
    if (!next) {
      this.locked = false
      return
    }
    if (next.timer) clearTimeout(next.timer)
    next.resolve()
  }

  async runExclusive<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs)
    try {
      return await fn()
    } finally {
      this.release()
    }
  }
}

export type KeyedMutexOptions = {
  timeoutMs?: number
}

/** One {@link Mutex} per key; idle keys are dropped. */
export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>()

  isLocked(key: string): boolean {
    return this.locks.get(key)?.isLocked ?? false
  }

  get size(): number {
    return this.locks.size
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>, options?: KeyedMutexOptions): Promise<T> {
    let mutex = this.locks.get(key)
    if (!mutex) {
      mutex = new Mutex(key)
      this.locks.set(key, mutex)
    }
    try {
      return await mutex.runExclusive(fn, options?.timeoutMs)
    } finally {
      if (!mutex.isLocked && mutex.pending === 0 && this.locks.get(key) === mutex) {
        this.locks.delete(key)
      }
    }
  }
}
