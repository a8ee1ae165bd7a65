import type { Clock, Seconds } from "@strata/clock"
import { BaseCacheDriver } from "../../core/base-cache-driver"
import {
  assertLifetime,
  isFresh,
  resolveDefaultLifetime,
  resolveLifetime,
} from "../../core/lifetime"
import type { CacheKey } from "../../ports/cache-key"
import { type CacheLifetime, DEFAULT_READ_LIFETIME_SECONDS } from "../../ports/cache-lifetime"
import type { CacheResult } from "../../ports/cache-result"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { RedisBytesClient } from "./redis-client"

export type RedisCacheDriverOptions = {
  keyspacePrefix: KeyspacePrefix

  /** Default write lifetime in seconds. */
  lifetime?: Seconds
}

export type RedisCacheDriverDeps = {
  client: RedisBytesClient
  clock: Clock
}

// No caller key maps into the write-time namespace.
const VALUE_NAMESPACE = "v:"
const WRITTEN_AT_NAMESPACE = "t:"

/**
 * Redis-backed driver.
 *
 * Positive lifetimes are enforced natively with `EX`. The value lives at
 * `<prefix>v:<key>` and its write time in a sidecar `<prefix>t:<key>` with the
 * same TTL; read-time lifetimes are checked against the sidecar. Entries
 * written with lifetime 0 have no TTL and no sidecar.
 *
 * Client errors are not caught here; they reject the returned promise.
 */
export class RedisCacheDriver extends BaseCacheDriver<Uint8Array> {
  readonly lifetime: Seconds

  public constructor(
    private readonly deps: RedisCacheDriverDeps,
    private readonly opts: RedisCacheDriverOptions,
  ) {
    super()

    this.lifetime = resolveDefaultLifetime(opts.lifetime)
  }

  async get(
    key: CacheKey,
    lifetime: CacheLifetime = DEFAULT_READ_LIFETIME_SECONDS,
  ): Promise<CacheResult<Uint8Array>> {
    assertLifetime(lifetime)

    const [value, writtenAt] = await this.deps.client.mGet(this.keysFor(key))

    if (value === null || value === undefined) return { kind: "miss" }

    if (!(await this.checkFresh(key, writtenAt ?? null, lifetime))) return { kind: "miss" }

    return { kind: "hit", value: new Uint8Array(value) }
  }

  async set(key: CacheKey, data: Uint8Array, lifetime?: CacheLifetime): Promise<boolean> {
    const resolved = resolveLifetime(lifetime, this.lifetime)
    const [valueKey, writtenAtKey] = this.keysFor(key)
    const tx = this.deps.client.multi()

    if (resolved > 0) {
      const writtenAt = Buffer.from(String(this.deps.clock.nowMs()), "utf8")

      tx.set(valueKey, data, { EX: resolved })
      tx.set(writtenAtKey, writtenAt, { EX: resolved })
    } else {
      tx.set(valueKey, data)
      tx.del(writtenAtKey)
    }

    await tx.exec()

    return true
  }

  async exists(
    key: CacheKey,
    lifetime: CacheLifetime = DEFAULT_READ_LIFETIME_SECONDS,
  ): Promise<boolean> {
    const res = await this.get(key, lifetime)

    return res.kind === "hit"
  }

  async expire(key: CacheKey): Promise<boolean> {
    await this.deps.client.del(this.keysFor(key))

    return true
  }

  /** Removes the entry when it is stale under `lifetime`. */
  private async checkFresh(
    key: CacheKey,
    writtenAt: Buffer | null,
    lifetime: Seconds,
  ): Promise<boolean> {
    if (writtenAt === null) return true

    const writtenAtMs = Number(writtenAt.toString("utf8"))
    const nowMs = this.deps.clock.nowMs()

    // Redis has already dropped entries past their TTL.
    if (isFresh({ writtenAtMs, expiresAtMs: Number.POSITIVE_INFINITY }, lifetime, nowMs)) {
      return true
    }

    await this.expire(key)

    return false
  }

  private keysFor(key: CacheKey): [valueKey: string, writtenAtKey: string] {
    const prefix = this.opts.keyspacePrefix

    return [`${prefix}${VALUE_NAMESPACE}${key}`, `${prefix}${WRITTEN_AT_NAMESPACE}${key}`]
  }
}
