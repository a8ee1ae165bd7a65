import type { CacheDriver } from "../ports/cache-driver"
import type { CacheKey } from "../ports/cache-key"
import { type CacheLifetime, DEFAULT_READ_LIFETIME_SECONDS } from "../ports/cache-lifetime"
import type { CacheResult } from "../ports/cache-result"
import type { OutputSink } from "../ports/output-sink"

/**
 * Shared base for drivers: implements the derived `output` operation once,
 * on top of `get`.
 */
export abstract class BaseCacheDriver<T> implements CacheDriver<T> {
  abstract get(key: CacheKey, lifetime?: CacheLifetime): Promise<CacheResult<T>>

  abstract set(key: CacheKey, data: T, lifetime?: CacheLifetime): Promise<boolean>

  abstract exists(key: CacheKey, lifetime?: CacheLifetime): Promise<boolean>

  abstract expire(key: CacheKey): Promise<boolean>

  async output(
    key: CacheKey,
    sink: OutputSink<T>,
    lifetime: CacheLifetime = DEFAULT_READ_LIFETIME_SECONDS,
  ): Promise<boolean> {
    const res = await this.get(key, lifetime)

    if (res.kind === "miss") return false

    await sink.write(res.value)

    return true
  }
}
