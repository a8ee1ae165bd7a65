import { BaseCacheDriver } from "../../core/base-cache-driver"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheLifetime } from "../../ports/cache-lifetime"
import type { CacheResult } from "../../ports/cache-result"

/**
 * Stores nothing. Useful to disable caching without changing call sites:
 * reads always miss, writes and expiries report success.
 */
export class NullCacheDriver<T> extends BaseCacheDriver<T> {
  async get(_key: CacheKey, _lifetime?: CacheLifetime): Promise<CacheResult<T>> {
    return { kind: "miss" }
  }

  async set(_key: CacheKey, _data: T, _lifetime?: CacheLifetime): Promise<boolean> {
    return true
  }

  async exists(_key: CacheKey, _lifetime?: CacheLifetime): Promise<boolean> {
    return false
  }

  async expire(_key: CacheKey): Promise<boolean> {
    return true
  }
}
