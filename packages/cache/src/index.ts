export {
  MemoryCacheDriver,
  type MemoryCacheDriverDeps,
  type MemoryCacheDriverOptions,
  type MemoryCacheEntry,
} from "./adapters/memory/memory-cache-driver"
export { NullCacheDriver } from "./adapters/null/null-cache-driver"
export {
  RedisCacheDriver,
  type RedisCacheDriverDeps,
  type RedisCacheDriverOptions,
} from "./adapters/redis/redis-cache-driver"
export {
  type ConnectableRedisBytesClient,
  createRedisBytesClient,
  type RedisBytesClient,
  type RedisBytesMulti,
  type RedisTtl,
} from "./adapters/redis/redis-client"
export { BaseCacheDriver } from "./core/base-cache-driver"
export {
  type CacheConfig,
  type CacheFromConfigDeps,
  cacheConfigSchema,
  createCacheFromConfig,
  loadCacheConfig,
} from "./core/cache-config"
export { createCacheNamespace } from "./core/cache-namespace"
export { CodecCacheDriver } from "./core/codec-cache-driver"
export { superjsonCodec, utf8Codec } from "./core/codecs"
export {
  type CreateStackCacheDriverOptions,
  createStackCacheDriver,
} from "./core/create-stack-cache-driver"
export {
  createDefaultDriverRegistry,
  DEFAULT_MEMORY_MAX_ENTRIES,
  DEFAULT_REDIS_KEYSPACE_PREFIX,
  type DefaultDriverRegistryDeps,
} from "./core/default-driver-registry"
export {
  type CacheDriverFactory,
  CacheDriverRegistry,
  type DriverParams,
  driverDescriptorListSchema,
  driverDescriptorSchema,
  parseDriverDescriptors,
  parseDriverParams,
} from "./core/driver-registry"
export {
  CacheBackendError,
  type CacheBackendErrorContext,
  CacheConfigurationError,
  type CacheOperation,
} from "./core/errors"
export {
  createEvictionMap,
  type EvictionMap,
  FifoMemoryMap,
  LruMemoryMap,
} from "./core/eviction/eviction-map"
export {
  type StackCacheDriverDeps,
  type StackCacheDriverOptions,
  StackCacheDriver,
} from "./core/stack-cache-driver"
export type { CacheDriver } from "./ports/cache-driver"
export { type CacheEvictionPolicy, cacheEvictionPolicies } from "./ports/cache-eviction-policy"
export type { CacheKey } from "./ports/cache-key"
export {
  type CacheLifetime,
  DEFAULT_LIFETIME_SECONDS,
  DEFAULT_READ_LIFETIME_SECONDS,
  NO_EXPIRY,
} from "./ports/cache-lifetime"
export type { CacheNamespace } from "./ports/cache-namespace"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { Codec } from "./ports/codec"
export type { DriverDescriptor } from "./ports/driver-descriptor"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
export type { OutputSink } from "./ports/output-sink"
