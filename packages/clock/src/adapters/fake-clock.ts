import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Manually driven clock. `sleep` resolves on the next microtask and moves
 * time forward by the requested amount, so code that waits still observes
 * time passing.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  readonly sleeps: Milliseconds[] = []

  constructor(start: Milliseconds | Date = 0) {
    this.time = start instanceof Date ? start.getTime() : start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms)
    if (signal?.aborted || ms <= 0) return
    this.time += ms
  }
}
