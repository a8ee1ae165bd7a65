import type { Clock } from "../ports/clock"
import { type Milliseconds, type Seconds, secondsToMs, type UnixMs } from "../ports/time"

/** Manually driven clock for tests. Time only moves when told to. */
export class FakeClock implements Clock {
  private time: UnixMs

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  advanceSeconds(seconds: Seconds): void {
    this.advance(secondsToMs(seconds))
  }

  set(ms: UnixMs): void {
    this.time = ms
  }
}
