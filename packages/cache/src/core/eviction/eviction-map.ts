import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"

/**
 * Eviction-aware key/value storage for in-memory drivers.
 *
 * Encapsulates ordering (LRU, FIFO) behind a minimal Map-like interface.
 */
export interface EvictionMap<K, V> {
  /**
   * Implementations may update ordering as a side effect
   * (touch-on-read for LRU).
   */
  get(key: K): V | undefined

  set(key: K, value: V): void

  /** Returns true if the key was present. */
  delete(key: K): boolean

  has(key: K): boolean

  size(): number

  /** Next key to evict under this policy, or `undefined` when empty. */
  victim(): K | undefined
}

abstract class OrderedMemoryMap<K, V> implements EvictionMap<K, V> {
  protected readonly map = new Map<K, V>()

  abstract get(key: K): V | undefined

  abstract set(key: K, value: V): void

  delete(key: K): boolean {
    return this.map.delete(key)
  }

  has(key: K): boolean {
    return this.map.has(key)
  }

  size(): number {
    return this.map.size
  }

  // Map iterates in insertion order, so the oldest position is first.
  victim(): K | undefined {
    for (const key of this.map.keys()) return key

    return undefined
  }
}

/** Overwrites keep a key's original position. */
export class FifoMemoryMap<K, V> extends OrderedMemoryMap<K, V> {
  get(key: K): V | undefined {
    return this.map.get(key)
  }

  set(key: K, value: V): void {
    this.map.set(key, value)
  }
}

/** Reads and writes move a key to the most recently used position. */
export class LruMemoryMap<K, V> extends OrderedMemoryMap<K, V> {
  get(key: K): V | undefined {
    const value = this.map.get(key)

    if (value === undefined) return undefined

    this.map.delete(key)
    this.map.set(key, value)

    return value
  }

  set(key: K, value: V): void {
    this.map.delete(key)
    this.map.set(key, value)
  }
}

export function createEvictionMap<K, V>(policy: CacheEvictionPolicy): EvictionMap<K, V> {
  return policy === "fifo" ? new FifoMemoryMap<K, V>() : new LruMemoryMap<K, V>()
}
