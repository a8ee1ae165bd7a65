/**
 * Least Recently Used: evicts the entry that has gone longest without a read
 * or write.
 */
export type LruCacheEvictionPolicy = "lru"

/**
 * First In, First Out: evicts in insertion order regardless of access.
 */
export type FifoCacheEvictionPolicy = "fifo"

export type CacheEvictionPolicy = LruCacheEvictionPolicy | FifoCacheEvictionPolicy

export const cacheEvictionPolicies = ["lru", "fifo"] as const satisfies readonly CacheEvictionPolicy[]
