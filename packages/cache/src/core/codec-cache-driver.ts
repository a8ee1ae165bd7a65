import type { CacheDriver } from "../ports/cache-driver"
import type { CacheKey } from "../ports/cache-key"
import type { CacheLifetime } from "../ports/cache-lifetime"
import type { CacheResult } from "../ports/cache-result"
import type { Codec } from "../ports/codec"
import { BaseCacheDriver } from "./base-cache-driver"

/**
 * Typed view over a byte-oriented driver (a leaf or a whole stack).
 *
 * Lifetimes pass through untouched, so the inner driver's default applies.
 */
export class CodecCacheDriver<T> extends BaseCacheDriver<T> {
  public constructor(
    private readonly bytesDriver: CacheDriver<Uint8Array>,
    private readonly codec: Codec<T>,
  ) {
    super()
  }

  async get(key: CacheKey, lifetime?: CacheLifetime): Promise<CacheResult<T>> {
    const res = await this.bytesDriver.get(key, lifetime)

    if (res.kind === "miss") return res

    return { kind: "hit", value: this.codec.decode(res.value) }
  }

  async set(key: CacheKey, data: T, lifetime?: CacheLifetime): Promise<boolean> {
    return this.bytesDriver.set(key, this.codec.encode(data), lifetime)
  }

  async exists(key: CacheKey, lifetime?: CacheLifetime): Promise<boolean> {
    return this.bytesDriver.exists(key, lifetime)
  }

  async expire(key: CacheKey): Promise<boolean> {
    return this.bytesDriver.expire(key)
  }
}
