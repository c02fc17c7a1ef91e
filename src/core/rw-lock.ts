/**
 * RwLock: async shared/exclusive lock for a single process.
 *
 * Readers run together; a writer runs alone. Waiters are granted in FIFO
 * order, so a queued writer is not starved by readers arriving after it.
 */

interface Waiter {
  exclusive: boolean
  grant: () => void
}

export class RwLock {
  private readers = 0
  private writing = false
  private queue: Waiter[] = []

  /** Run `fn` holding the shared side of the lock. */
  async read<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire(false)
    try {
      return await fn()
    } finally {
      this.release(false)
    }
  }

  /** Run `fn` holding the exclusive side of the lock. */
  async write<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire(true)
    try {
      return await fn()
    } finally {
      this.release(true)
    }
  }

  private canGrant(exclusive: boolean): boolean {
    return exclusive ? !this.writing && this.readers === 0 : !this.writing
  }

  private take(exclusive: boolean): void {
    if (exclusive) this.writing = true
    else this.readers += 1
  }

  private acquire(exclusive: boolean): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(exclusive)) {
      this.take(exclusive)
      return Promise.resolve()
    }
    return new Promise<void>((grant) => {
      this.queue.push({ exclusive, grant })
    })
  }

  private release(exclusive: boolean): void {
    if (exclusive) this.writing = false
    else this.readers -= 1
    this.drain()
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0]
      if (!this.canGrant(next.exclusive)) return
      this.queue.shift()
      this.take(next.exclusive)
      next.grant()
      if (next.exclusive) return
    }
  }
}
