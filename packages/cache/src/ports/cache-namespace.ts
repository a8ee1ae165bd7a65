import type { CacheKey } from "./cache-key"

/**
 * A logical namespace used to construct cache keys.
 *
 * @remarks
 * Namespaces keep logical caches that share a backend (or a whole stack) from
 * colliding. Keys are built as `<prefix>:<part>:<part>`.
 */
export interface CacheNamespace {
  /**
   * Stable, application-unique prefix, ideally versioned
   * (e.g. "users-by-id:v1").
   */
  readonly prefix: string

  /**
   * Construct a cache key within this namespace.
   *
   * @param parts Components that identify an entry within the namespace.
   */
  key(...parts: readonly (string | number)[]): CacheKey
}
