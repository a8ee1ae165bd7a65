export type CacheHit<T> = {
  kind: "hit"
  value: T
}

export type CacheMiss = {
  kind: "miss"
}

/**
 * Outcome of a cache read.
 *
 * A hit always carries the stored value, even when that value is falsy
 * (`false`, `0`, `""`, an empty byte array).
 */
export type CacheResult<T> = CacheHit<T> | CacheMiss
