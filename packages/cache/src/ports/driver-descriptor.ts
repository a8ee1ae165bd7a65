/**
 * Declarative description of a cache driver, resolved through a
 * {@link CacheDriverRegistry}.
 *
 * @example
 * ```ts
 * const descriptor: DriverDescriptor = {
 *   driver: "memory",
 *   params: { maxEntries: 1000, lifetime: 300 },
 * }
 * ```
 */
export type DriverDescriptor = {
  /** Registered driver kind, e.g. "memory", "redis", "stack". */
  driver: string

  /** Driver-specific parameters, validated by the driver's factory. */
  params?: Record<string, unknown>
}
