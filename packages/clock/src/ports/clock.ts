import type { UnixMs } from "./time"

/**
 * Source of wall-clock time.
 *
 * @remarks
 * Cache drivers read time only through this port so expiry can be tested
 * without real waiting.
 */
export interface Clock {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs
}
