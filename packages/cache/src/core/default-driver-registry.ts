import { type Clock, type Seconds, SystemClock } from "@strata/clock"
import type { Logger } from "@strata/logger"
import { z } from "zod"
import { MemoryCacheDriver } from "../adapters/memory/memory-cache-driver"
import { NullCacheDriver } from "../adapters/null/null-cache-driver"
import { RedisCacheDriver } from "../adapters/redis/redis-cache-driver"
import type { RedisBytesClient } from "../adapters/redis/redis-client"
import { cacheEvictionPolicies } from "../ports/cache-eviction-policy"
import { DEFAULT_LIFETIME_SECONDS } from "../ports/cache-lifetime"
import { createStackCacheDriver } from "./create-stack-cache-driver"
import { CacheDriverRegistry, parseDriverParams } from "./driver-registry"

export const DEFAULT_MEMORY_MAX_ENTRIES = 10_000
export const DEFAULT_REDIS_KEYSPACE_PREFIX = "cache:"

export type DefaultDriverRegistryDeps = {
  clock?: Clock
  logger?: Logger

  /** Enables the "redis" kind. */
  redis?: RedisBytesClient

  /** Fallbacks for params a descriptor leaves out. */
  defaults?: {
    lifetime?: Seconds
    maxEntries?: number
  }
}

const lifetimeSchema = z.number().int().min(0)

const memoryParamsSchema = z.object({
  maxEntries: z.number().int().min(1).optional(),
  lifetime: lifetimeSchema.optional(),
  evictionPolicy: z.enum(cacheEvictionPolicies).optional(),
})

const redisParamsSchema = z.object({
  keyspacePrefix: z.string().default(DEFAULT_REDIS_KEYSPACE_PREFIX),
  lifetime: lifetimeSchema.optional(),
})

const nullParamsSchema = z.object({})

const stackParamsSchema = z.object({
  stack: z.unknown(),
  lifetime: lifetimeSchema.optional(),
})

/**
 * Registry of the byte drivers shipped with this package: "memory", "null",
 * "stack" and, when a client is supplied, "redis".
 *
 * "stack" builds its members through the same registry, so stacks nest.
 *
 * @example
 * ```ts
 * const registry = createDefaultDriverRegistry({ redis: client })
 *
 * const cache = registry.create({
 *   driver: "stack",
 *   params: {
 *     stack: [
 *       { driver: "memory", params: { maxEntries: 500 } },
 *       { driver: "redis", params: { keyspacePrefix: "app:cache:" } },
 *     ],
 *   },
 * })
 * ```
 */
export function createDefaultDriverRegistry(
  deps: DefaultDriverRegistryDeps = {},
): CacheDriverRegistry<Uint8Array> {
  const clock = deps.clock ?? new SystemClock()
  const defaultLifetime = deps.defaults?.lifetime ?? DEFAULT_LIFETIME_SECONDS
  const defaultMaxEntries = deps.defaults?.maxEntries ?? DEFAULT_MEMORY_MAX_ENTRIES

  const registry = new CacheDriverRegistry<Uint8Array>()
    .register("memory", (params) => {
      const opts = parseDriverParams("memory", memoryParamsSchema, params)

      return new MemoryCacheDriver(
        { clock },
        {
          maxEntries: opts.maxEntries ?? defaultMaxEntries,
          lifetime: opts.lifetime ?? defaultLifetime,
          evictionPolicy: opts.evictionPolicy ?? "lru",
        },
      )
    })
    .register("null", (params) => {
      parseDriverParams("null", nullParamsSchema, params)

      return new NullCacheDriver<Uint8Array>()
    })
    .register("stack", (params, self) => {
      const opts = parseDriverParams("stack", stackParamsSchema, params)

      return createStackCacheDriver({
        registry: self,
        stack: opts.stack,
        lifetime: opts.lifetime ?? defaultLifetime,
        logger: deps.logger,
      })
    })

  const client = deps.redis

  if (client !== undefined) {
    registry.register("redis", (params) => {
      const opts = parseDriverParams("redis", redisParamsSchema, params)

      return new RedisCacheDriver(
        { client, clock },
        { keyspacePrefix: opts.keyspacePrefix, lifetime: opts.lifetime ?? defaultLifetime },
      )
    })
  }

  return registry
}
