/** A duration in milliseconds. */
export type Milliseconds = number

/** A duration in whole seconds. */
export type Seconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = number

export function secondsToMs(seconds: Seconds): Milliseconds {
  return seconds * 1000
}

/** Whole seconds contained in `ms`, rounded down. */
export function msToSeconds(ms: Milliseconds): Seconds {
  return Math.floor(ms / 1000)
}
