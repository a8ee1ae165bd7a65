import type { Seconds } from "@strata/clock"
import type { Logger } from "@strata/logger"
import { type CacheDriverRegistry, parseDriverDescriptors } from "./driver-registry"
import { StackCacheDriver } from "./stack-cache-driver"

export type CreateStackCacheDriverOptions<T> = {
  registry: CacheDriverRegistry<T>

  /** Descriptor list in read-priority order; the last one is the master. */
  stack: unknown

  lifetime?: Seconds
  logger?: Logger
}

/**
 * Build a stack from descriptors. Members are created through the registry
 * in list order.
 */
export function createStackCacheDriver<T>({
  registry,
  stack,
  lifetime,
  logger,
}: CreateStackCacheDriverOptions<T>): StackCacheDriver<T> {
  const drivers = parseDriverDescriptors(stack).map((descriptor) => registry.create(descriptor))

  return new StackCacheDriver(drivers, { lifetime }, { logger })
}
