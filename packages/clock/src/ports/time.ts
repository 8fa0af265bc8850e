export type Milliseconds = number

export type Seconds = number

export function secondsToMs(s: Seconds): Milliseconds {
  return s * 1000
}

export function msToSeconds(ms: Milliseconds): Seconds {
  return ms / 1000
}
