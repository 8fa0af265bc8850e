type Waiter<T> = {
  resolve: (item: T) => void
}

/**
 * Unbounded FIFO of pending job ids. Consumers wait on {@link take}; an
 * enqueue hands the item straight to the oldest waiter.
 */
export class JobQueue<T> {
  private items: T[] = []
  private head = 0
  private readonly waiters: Waiter<T>[] = []

  enqueue(item: T): void {
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter.resolve(item)
      return
    }

    this.items.push(item)
  }

  /** Next item without waiting, or `undefined` when empty. */
  poll(): T | undefined {
    if (this.head >= this.items.length) return undefined

    const item = this.items[this.head]
    this.head++
    this.compact()

    return item
  }

  /** Resolves with the next item. Rejects with the signal's reason on abort. */
  take(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) return Promise.reject(signal.reason)

    const next = this.poll()
    if (next !== undefined) return Promise.resolve(next)

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter)
        if (index !== -1) this.waiters.splice(index, 1)
        reject(signal?.reason)
      }

      const waiter: Waiter<T> = {
        resolve: (item) => {
          signal?.removeEventListener("abort", onAbort)
          resolve(item)
        },
      }

      this.waiters.push(waiter)
      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  /** Number of items ahead of `item`, or `null` once it has been taken. */
  position(item: T): number | null {
    for (let i = this.head; i < this.items.length; i++) {
      if (this.items[i] === item) return i - this.head
    }

    return null
  }

  get size(): number {
    return this.items.length - this.head
  }

  get waiting(): number {
    return this.waiters.length
  }

  private compact(): void {
    if (this.head === this.items.length) {
      this.items = []
      this.head = 0
    } else if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head)
      this.head = 0
    }
  }
}
