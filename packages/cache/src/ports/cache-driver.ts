import type { CacheKey } from "./cache-key"
import type { CacheLifetime } from "./cache-lifetime"
import type { CacheResult } from "./cache-result"
import type { OutputSink } from "./output-sink"

/**
 * Uniform contract implemented by every cache backend and by the stack
 * composite.
 *
 * @remarks
 * - Every driver is configured with a default write lifetime at
 *   construction; an unspecified `lifetime` on `set` resolves to it.
 * - A driver may reject when its backend fails (connection loss, timeouts).
 *   Composites treat a rejection like a failed or missed outcome.
 * - A miss does not imply absence in the source of truth.
 */
export interface CacheDriver<T> {
  /**
   * Retrieve the value for `key` if it is present and fresh under `lifetime`.
   *
   * @param lifetime Read-time freshness window in seconds. Defaults to 1;
   * `0` skips the freshness check.
   */
  get(key: CacheKey, lifetime?: CacheLifetime): Promise<CacheResult<T>>

  /**
   * Store `data` under `key`.
   *
   * @param lifetime Seconds until expiry; unspecified uses the driver
   * default, `0` keeps the entry until it is explicitly expired.
   * @returns Whether the write succeeded.
   */
  set(key: CacheKey, data: T, lifetime?: CacheLifetime): Promise<boolean>

  /**
   * Whether a fresh entry exists under `lifetime`, without necessarily
   * fetching it. Same lifetime rules as {@link get}.
   */
  exists(key: CacheKey, lifetime?: CacheLifetime): Promise<boolean>

  /**
   * Remove any entry for `key`, whatever its lifetime.
   *
   * Idempotent: expiring an absent key succeeds.
   */
  expire(key: CacheKey): Promise<boolean>

  /**
   * Read `key` and, on a hit, write the value to `sink`.
   *
   * @returns `true` if a value was found and written.
   */
  output(key: CacheKey, sink: OutputSink<T>, lifetime?: CacheLifetime): Promise<boolean>
}
