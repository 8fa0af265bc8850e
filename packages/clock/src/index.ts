export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { Clock, Sleeper, TimeSource } from "./ports/clock"
export { msToSeconds, secondsToMs } from "./ports/time"
export type { Milliseconds, Seconds } from "./ports/time"
