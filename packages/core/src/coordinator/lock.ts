import { BookingError } from '../errors.js'

interface Waiter {
  grant: () => void
  timer?: NodeJS.Timeout
}

export interface LockOptions {
  /** Give up waiting after this long; the holder is never interrupted */
  timeoutMs?: number
}

/**
 * Process-wide mutual exclusion with FIFO hand-off. Waiters are granted the
 * lock in the order they asked for it, so operations complete in that order.
 */
export class AsyncLock {
  private locked = false
  private waiters: Waiter[] = []

  get isLocked(): boolean {
    return this.locked
  }

  /** Callers currently waiting for the lock */
  get pending(): number {
    return this.waiters.length
  }

  async runExclusive<T>(fn: () => Promise<T>, options: LockOptions = {}): Promise<T> {
    await this.acquire(options.timeoutMs)
    try {
      return await fn()
    } finally {
      this.release()
    }
  }

  private acquire(timeoutMs?: number): Promise<void> {
    if (!this.locked) {
      this.locked = true
      return Promise.resolve()
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          if (waiter.timer) clearTimeout(waiter.timer)
          resolve()
        },
      }
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter)
          reject(new BookingError('Timeout', `Timed out after ${timeoutMs} ms waiting for another operation to finish`, { timeoutMs }))
        }, timeoutMs)
      }
      this.waiters.push(waiter)
    })
  }

  private release(): void {
    const next = this.waiters.shift()
    if (next) {
      // Ownership passes straight to the next waiter; `locked` stays true
      next.grant()
    } else {
      this.locked = false
    }
  }
}
