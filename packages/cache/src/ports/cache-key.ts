/**
 * CacheKey is intentionally a plain, non-empty string.
 *
 * Keys _should_ be:
 * - stable
 * - namespaced
 * - versioned
 *
 * @remarks
 * Drivers treat keys as opaque. Build them through a {@link CacheNamespace}
 * rather than ad-hoc interpolation so formats stay consistent.
 *
 * @example
 * ```ts
 * const key: CacheKey = "users.by-id:v1:123"
 * ```
 */
export type CacheKey = string
