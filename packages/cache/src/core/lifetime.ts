import { type Seconds, secondsToMs, type UnixMs } from "@strata/clock"
import { type CacheLifetime, DEFAULT_LIFETIME_SECONDS, NO_EXPIRY } from "../ports/cache-lifetime"
import { CacheConfigurationError } from "./errors"

export function isValidLifetime(lifetime: number): boolean {
  return Number.isInteger(lifetime) && lifetime >= 0
}

/**
 * Validate a configured default lifetime, falling back to
 * {@link DEFAULT_LIFETIME_SECONDS}.
 */
export function resolveDefaultLifetime(lifetime: CacheLifetime | undefined): Seconds {
  const resolved = lifetime ?? DEFAULT_LIFETIME_SECONDS

  if (!isValidLifetime(resolved)) {
    throw new CacheConfigurationError(
      `Default cache lifetime must be a non-negative integer of seconds, got ${resolved}`,
      { lifetime: resolved },
    )
  }

  return resolved
}

/** Substitute the configured default for an unspecified lifetime. */
export function resolveLifetime(
  lifetime: CacheLifetime | undefined,
  defaultLifetime: Seconds,
): Seconds {
  const resolved = lifetime ?? defaultLifetime
  assertLifetime(resolved)

  return resolved
}

export function assertLifetime(lifetime: CacheLifetime): void {
  if (!isValidLifetime(lifetime)) {
    throw new RangeError(
      `Cache lifetime must be a non-negative integer of seconds, got ${lifetime}`,
    )
  }
}

/**
 * Write-time bookkeeping a leaf driver keeps next to a value.
 *
 * `expiresAtMs` is absent for entries written with lifetime 0.
 */
export type EntryTimes = {
  writtenAtMs: UnixMs
  expiresAtMs?: UnixMs
}

export function entryTimes(nowMs: UnixMs, lifetime: Seconds): EntryTimes {
  if (lifetime === NO_EXPIRY) return { writtenAtMs: nowMs }

  return { writtenAtMs: nowMs, expiresAtMs: nowMs + secondsToMs(lifetime) }
}

/**
 * Whether an entry may still be served.
 *
 * - Entries written with lifetime 0 never go stale.
 * - Past their write-time expiry, entries are gone.
 * - Otherwise a positive read lifetime rejects entries written more than
 *   that many seconds ago; a read lifetime of 0 accepts them.
 */
export function isFresh(times: EntryTimes, readLifetime: Seconds, nowMs: UnixMs): boolean {
  if (times.expiresAtMs === undefined) return true
  if (times.expiresAtMs <= nowMs) return false
  if (readLifetime === NO_EXPIRY) return true

  return times.writtenAtMs + secondsToMs(readLifetime) >= nowMs
}
