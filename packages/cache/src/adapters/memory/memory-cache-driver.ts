import type { Clock, Seconds } from "@strata/clock"
import { BaseCacheDriver } from "../../core/base-cache-driver"
import { CacheConfigurationError } from "../../core/errors"
import { createEvictionMap, type EvictionMap } from "../../core/eviction/eviction-map"
import {
  assertLifetime,
  type EntryTimes,
  entryTimes,
  isFresh,
  resolveDefaultLifetime,
  resolveLifetime,
} from "../../core/lifetime"
import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { CacheKey } from "../../ports/cache-key"
import { type CacheLifetime, DEFAULT_READ_LIFETIME_SECONDS } from "../../ports/cache-lifetime"
import type { CacheResult } from "../../ports/cache-result"

export type MemoryCacheDriverOptions = {
  /**
   * Maximum number of entries retained.
   *
   * Writing a new key into a full cache evicts one entry according to
   * `evictionPolicy`.
   */
  maxEntries: number

  /** Default write lifetime in seconds. */
  lifetime?: Seconds

  /** Default: "lru". */
  evictionPolicy?: CacheEvictionPolicy
}

export type MemoryCacheDriverDeps = {
  clock: Clock

  /** Overrides the store built from `evictionPolicy`. */
  store?: EvictionMap<CacheKey, MemoryCacheEntry>
}

export type MemoryCacheEntry = EntryTimes & {
  value: Uint8Array
}

/**
 * In-process accelerator cache. Entries live in this process only and are
 * checked for expiry lazily, on access.
 */
export class MemoryCacheDriver extends BaseCacheDriver<Uint8Array> {
  readonly lifetime: Seconds

  private readonly store: EvictionMap<CacheKey, MemoryCacheEntry>

  public constructor(
    private readonly deps: MemoryCacheDriverDeps,
    private readonly opts: MemoryCacheDriverOptions,
  ) {
    super()

    if (!Number.isInteger(opts.maxEntries) || opts.maxEntries < 1) {
      throw new CacheConfigurationError(
        `maxEntries must be a positive integer, got ${opts.maxEntries}`,
        { maxEntries: opts.maxEntries },
      )
    }

    this.lifetime = resolveDefaultLifetime(opts.lifetime)
    this.store = deps.store ?? createEvictionMap(opts.evictionPolicy ?? "lru")
  }

  async get(
    key: CacheKey,
    lifetime: CacheLifetime = DEFAULT_READ_LIFETIME_SECONDS,
  ): Promise<CacheResult<Uint8Array>> {
    const entry = this.freshEntry(key, lifetime)

    if (entry === undefined) return { kind: "miss" }

    return { kind: "hit", value: new Uint8Array(entry.value) }
  }

  async set(key: CacheKey, data: Uint8Array, lifetime?: CacheLifetime): Promise<boolean> {
    const resolved = resolveLifetime(lifetime, this.lifetime)

    if (!this.store.has(key)) this.ensureCapacity()

    this.store.set(key, {
      value: new Uint8Array(data),
      ...entryTimes(this.deps.clock.nowMs(), resolved),
    })

    return true
  }

  async exists(
    key: CacheKey,
    lifetime: CacheLifetime = DEFAULT_READ_LIFETIME_SECONDS,
  ): Promise<boolean> {
    return this.freshEntry(key, lifetime) !== undefined
  }

  async expire(key: CacheKey): Promise<boolean> {
    this.store.delete(key)

    return true
  }

  /** Number of stored entries, including expired ones not yet collected. */
  size(): number {
    return this.store.size()
  }

  private freshEntry(key: CacheKey, lifetime: CacheLifetime): MemoryCacheEntry | undefined {
    assertLifetime(lifetime)

    const entry = this.store.get(key)

    if (entry === undefined) return undefined

    if (!isFresh(entry, lifetime, this.deps.clock.nowMs())) {
      this.store.delete(key)

      return undefined
    }

    return entry
  }

  private ensureCapacity(): void {
    while (this.store.size() >= this.opts.maxEntries) {
      const victim = this.store.victim()

      if (victim === undefined) {
        throw new Error(
          "Invariant violation: EvictionMap.victim() returned undefined while over capacity",
        )
      }

      this.store.delete(victim)
    }
  }
}
