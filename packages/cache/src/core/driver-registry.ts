import { type ZodType, z } from "zod"
import type { CacheDriver } from "../ports/cache-driver"
import type { DriverDescriptor } from "../ports/driver-descriptor"
import { CacheConfigurationError } from "./errors"

export type DriverParams = Readonly<Record<string, unknown>>

/**
 * Builds a driver from its params. The registry is passed along so composite
 * drivers can build their own members.
 */
export type CacheDriverFactory<T> = (
  params: DriverParams,
  registry: CacheDriverRegistry<T>,
) => CacheDriver<T>

export const driverDescriptorSchema = z.object({
  driver: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional(),
}) satisfies ZodType<DriverDescriptor>

export const driverDescriptorListSchema = z.array(driverDescriptorSchema)

/**
 * Maps driver kinds to factories.
 *
 * @example
 * ```ts
 * const registry = new CacheDriverRegistry<Uint8Array>()
 *   .register("null", () => new NullCacheDriver())
 *
 * registry.create({ driver: "null" })
 * ```
 */
export class CacheDriverRegistry<T> {
  private readonly factories = new Map<string, CacheDriverFactory<T>>()

  register(kind: string, factory: CacheDriverFactory<T>): this {
    if (this.factories.has(kind)) {
      throw new CacheConfigurationError(`Cache driver "${kind}" is already registered`, {
        driver: kind,
      })
    }

    this.factories.set(kind, factory)

    return this
  }

  has(kind: string): boolean {
    return this.factories.has(kind)
  }

  kinds(): string[] {
    return [...this.factories.keys()]
  }

  create(descriptor: DriverDescriptor): CacheDriver<T> {
    const factory = this.factories.get(descriptor.driver)

    if (factory === undefined) {
      throw new CacheConfigurationError(`Unknown cache driver "${descriptor.driver}"`, {
        driver: descriptor.driver,
        known: this.kinds(),
      })
    }

    return factory(descriptor.params ?? {}, this)
  }
}

/**
 * Validate driver params against a schema, reporting failures as
 * {@link CacheConfigurationError}.
 */
export function parseDriverParams<P>(kind: string, schema: ZodType<P>, params: unknown): P {
  const result = schema.safeParse(params)

  if (!result.success) {
    throw new CacheConfigurationError(
      `Invalid params for cache driver "${kind}":\n${z.prettifyError(result.error)}`,
      { driver: kind },
      result.error,
    )
  }

  return result.data
}

/** Validate a stack descriptor list. A missing or empty list is an error. */
export function parseDriverDescriptors(stack: unknown): DriverDescriptor[] {
  if (stack === undefined || stack === null) {
    throw new CacheConfigurationError("Missing stack parameter")
  }

  const descriptors = parseDriverParams("stack", driverDescriptorListSchema, stack)

  if (descriptors.length === 0) {
    throw new CacheConfigurationError("Cache stack requires at least one driver")
  }

  return descriptors
}
