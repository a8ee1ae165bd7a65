import type { Clock } from "@strata/clock"
import { type ConfigSource, loadConfig } from "@strata/config"
import type { Logger } from "@strata/logger"
import { z } from "zod"
import type { RedisBytesClient } from "../adapters/redis/redis-client"
import { DEFAULT_LIFETIME_SECONDS } from "../ports/cache-lifetime"
import { createStackCacheDriver } from "./create-stack-cache-driver"
import { createDefaultDriverRegistry, DEFAULT_MEMORY_MAX_ENTRIES } from "./default-driver-registry"
import { driverDescriptorListSchema } from "./driver-registry"
import type { StackCacheDriver } from "./stack-cache-driver"

// Env values arrive as strings. Non-JSON input is left for the schema to reject.
function parseJson(value: unknown): unknown {
  if (typeof value !== "string") return value

  try {
    return JSON.parse(value)
  } catch {
    return value
  }
}

export const cacheConfigSchema = z.object({
  CACHE_LIFETIME: z.coerce.number().int().min(0).default(DEFAULT_LIFETIME_SECONDS),
  CACHE_STACK: z
    .preprocess(parseJson, driverDescriptorListSchema.min(1))
    .default([{ driver: "memory" }]),
  CACHE_MEMORY_MAX_ENTRIES: z.coerce.number().int().min(1).default(DEFAULT_MEMORY_MAX_ENTRIES),
})

export type CacheConfig = z.output<typeof cacheConfigSchema>

/** Read cache settings from `sources` (the process environment by default). */
export async function loadCacheConfig(sources?: readonly ConfigSource[]): Promise<CacheConfig> {
  const config = await loadConfig({ schema: cacheConfigSchema, sources })

  return config.value
}

export type CacheFromConfigDeps = {
  clock?: Clock
  logger?: Logger
  redis?: RedisBytesClient
}

/** Build the configured byte stack with the default driver registry. */
export function createCacheFromConfig(
  config: CacheConfig,
  deps: CacheFromConfigDeps = {},
): StackCacheDriver<Uint8Array> {
  const registry = createDefaultDriverRegistry({
    ...deps,
    defaults: { lifetime: config.CACHE_LIFETIME, maxEntries: config.CACHE_MEMORY_MAX_ENTRIES },
  })

  return createStackCacheDriver({
    registry,
    stack: config.CACHE_STACK,
    lifetime: config.CACHE_LIFETIME,
    logger: deps.logger,
  })
}
