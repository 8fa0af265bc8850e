/**
 * In-process mutual exclusion. Callers queue in arrival order; a rejected
 * critical section releases the lock like a resolved one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail
    let release: () => void = () => {}

    this.tail = new Promise<void>((resolve) => {
      release = resolve
    })

    try {
      await previous
      return await fn()
    } finally {
      release()
    }
  }
}
