import type { Seconds } from "@strata/clock"

/**
 * Lifetime of a cache entry in whole seconds.
 *
 * - `undefined`: unspecified; the driver's configured default applies.
 * - `0`: never expire. On reads, `0` disables the freshness check.
 * - `> 0`: on writes, the entry expires this many seconds after it was
 *   written; on reads, an entry written longer ago than this is stale.
 */
export type CacheLifetime = Seconds

/** Default write lifetime when neither the caller nor the driver config gives one. */
export const DEFAULT_LIFETIME_SECONDS: Seconds = 86_400

/** Read-time lifetime used by `get`, `exists` and `output` when none is given. */
export const DEFAULT_READ_LIFETIME_SECONDS: Seconds = 1

/** Lifetime that exempts an entry from passive expiry. */
export const NO_EXPIRY: Seconds = 0
