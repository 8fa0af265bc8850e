import type { Milliseconds } from "./time"

export type TimeSource = {
  /** Prefer `nowMs()` for arithmetic. */
  now(): Date

  nowMs(): Milliseconds
}

export interface Sleeper {
  /** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
