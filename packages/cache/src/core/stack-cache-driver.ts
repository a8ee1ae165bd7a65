import type { Seconds } from "@strata/clock"
import { createNullLogger, type Logger, type LogMeta } from "@strata/logger"
import type { CacheDriver } from "../ports/cache-driver"
import type { CacheKey } from "../ports/cache-key"
import type { CacheLifetime } from "../ports/cache-lifetime"
import type { CacheResult } from "../ports/cache-result"
import { BaseCacheDriver } from "./base-cache-driver"
import { CacheBackendError, CacheConfigurationError, type CacheOperation } from "./errors"
import { assertLifetime, resolveDefaultLifetime, resolveLifetime } from "./lifetime"

export type StackCacheDriverOptions = {
  /**
   * Default write lifetime in seconds. An unspecified lifetime on `set` is
   * resolved against this before the write fans out, so every tier receives
   * the same concrete lifetime.
   */
  lifetime?: Seconds
}

export type StackCacheDriverDeps = {
  logger?: Logger
}

type Members<T> = {
  drivers: readonly CacheDriver<T>[]
  master: CacheDriver<T>
  masterTier: number
}

type Attempt<R> = { ok: true; value: R } | { ok: false; error: CacheBackendError }

/**
 * Chains several drivers into one priority-ordered cache.
 *
 * - Reads (`get`, `exists`) go front to back and stop at the first hit.
 * - Writes and invalidations go back to front, starting with the master
 *   (the last driver).
 * - A failed or rejected master write aborts `set`; only the master's
 *   outcome decides `expire`.
 * - Other members are acceleration layers: their failures are logged and
 *   never surface to the caller.
 *
 * @example
 * ```ts
 * const cache = new StackCacheDriver([memory, redis], { lifetime: 300 })
 *
 * await cache.set("users:1", bytes) // redis first, then memory
 * await cache.get("users:1", 60)    // memory first, falls through to redis
 * ```
 */
export class StackCacheDriver<T> extends BaseCacheDriver<T> {
  readonly lifetime: Seconds

  private members: Members<T> | undefined
  private readonly logger: Logger

  constructor(
    drivers: readonly CacheDriver<T>[] | undefined,
    opts: StackCacheDriverOptions = {},
    deps: StackCacheDriverDeps = {},
  ) {
    super()

    const master = drivers?.at(-1)

    if (drivers === undefined || master === undefined) {
      throw new CacheConfigurationError("Cache stack requires at least one driver")
    }

    this.lifetime = resolveDefaultLifetime(opts.lifetime)
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "cache-stack" })
    this.members = Object.freeze({
      drivers: Object.freeze([...drivers]),
      master,
      masterTier: drivers.length - 1,
    })
  }

  /** Members in read-priority order. The last one is the master. */
  get drivers(): readonly CacheDriver<T>[] {
    return this.live().drivers
  }

  get master(): CacheDriver<T> {
    return this.live().master
  }

  async get(key: CacheKey, lifetime?: CacheLifetime): Promise<CacheResult<T>> {
    const { drivers } = this.live()

    if (lifetime !== undefined) assertLifetime(lifetime)

    for (const [tier, driver] of drivers.entries()) {
      const res = await this.attempt("get", key, tier, () => driver.get(key, lifetime))

      if (!res.ok) {
        this.logger.warn("cache tier read failed; falling through", this.meta(res.error))
        continue
      }

      if (res.value.kind === "hit") {
        this.logger.debug("cache stack hit", { operation: "get", key, tier })

        return res.value
      }
    }

    return { kind: "miss" }
  }

  async set(key: CacheKey, data: T, lifetime?: CacheLifetime): Promise<boolean> {
    const { drivers, masterTier } = this.live()
    const resolved = resolveLifetime(lifetime, this.lifetime)

    for (const [tier, driver] of [...drivers.entries()].reverse()) {
      const res = await this.attempt("set", key, tier, () => driver.set(key, data, resolved))

      if (res.ok && res.value) continue

      const meta = res.ok ? { operation: "set", key, tier } : this.meta(res.error)

      if (tier === masterTier) {
        this.logger.error("cache master write failed", meta)

        return false
      }

      this.logger.warn("cache tier write failed; expiring tier entry", meta)
      await this.invalidateTier(driver, key, tier)
    }

    return true
  }

  async exists(key: CacheKey, lifetime?: CacheLifetime): Promise<boolean> {
    const { drivers } = this.live()

    if (lifetime !== undefined) assertLifetime(lifetime)

    for (const [tier, driver] of drivers.entries()) {
      const res = await this.attempt("exists", key, tier, () => driver.exists(key, lifetime))

      if (!res.ok) {
        this.logger.warn("cache tier exists check failed; falling through", this.meta(res.error))
        continue
      }

      if (res.value) return true
    }

    return false
  }

  async expire(key: CacheKey): Promise<boolean> {
    const { drivers, masterTier } = this.live()
    let success = true

    for (const [tier, driver] of [...drivers.entries()].reverse()) {
      const res = await this.attempt("expire", key, tier, () => driver.expire(key))

      if (res.ok && res.value) continue

      const meta = res.ok ? { operation: "expire", key, tier } : this.meta(res.error)

      if (tier === masterTier) {
        success = false
        this.logger.error("cache master expire failed", meta)
      } else {
        this.logger.warn("cache tier expire failed", meta)
      }
    }

    return success
  }

  /**
   * Release the member drivers. Members are not closed; they may be shared.
   * Any later operation throws {@link CacheConfigurationError}.
   */
  close(): void {
    this.members = undefined
  }

  private async invalidateTier(driver: CacheDriver<T>, key: CacheKey, tier: number) {
    const res = await this.attempt("expire", key, tier, () => driver.expire(key))

    if (!res.ok) {
      this.logger.warn("cache tier expire after failed write failed", this.meta(res.error))
    }
  }

  private async attempt<R>(
    operation: CacheOperation,
    key: CacheKey,
    tier: number,
    call: () => Promise<R>,
  ): Promise<Attempt<R>> {
    try {
      return { ok: true, value: await call() }
    } catch (err) {
      return { ok: false, error: new CacheBackendError({ operation, key, tier }, err) }
    }
  }

  private meta(error: CacheBackendError): LogMeta {
    return { ...error.details, err: error }
  }

  private live(): Members<T> {
    if (this.members === undefined) {
      throw new CacheConfigurationError("Cache stack has been closed")
    }

    return this.members
  }
}
