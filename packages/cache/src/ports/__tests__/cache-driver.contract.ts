import { FakeClock } from "@strata/clock"
import { beforeEach, describe, expect, it } from "vitest"
import { bytes, keys } from "../../tests/utils/cache-test-helpers"
import { RecordingSink } from "../../tests/utils/recording-sink"
import type { CacheDriver } from "../cache-driver"

export type CacheDriverHarness = {
  name: string

  /** Builds a driver whose entries are timed by `clock`. */
  make(clock: FakeClock, opts?: { lifetime?: number }): CacheDriver<Uint8Array>
}

const START_MS = 1_700_000_000_000

export function describeCacheDriverContract(h: CacheDriverHarness): void {
  describe(`CacheDriver Contract Tests - ${h.name}`, () => {
    let clock: FakeClock
    let cache: CacheDriver<Uint8Array>

    beforeEach(() => {
      clock = new FakeClock(START_MS)
      cache = h.make(clock)
    })

    describe("get/set basic semantics", () => {
      it("returns miss when key is absent", async () => {
        const res = await cache.get("missing")

        expect(res).toStrictEqual({ kind: "miss" })
      })

      it("set reports success and get returns the same bytes", async () => {
        const ok = await cache.set(keys.one(), bytes.a())

        const res = await cache.get(keys.one())

        expect(ok).toBe(true)
        expect(res).toStrictEqual({ kind: "hit", value: bytes.a() })
      })

      it("overwriting an existing key updates the stored value", async () => {
        await cache.set(keys.one(), bytes.a())
        await cache.set(keys.one(), bytes.b())

        const res = await cache.get(keys.one())

        expect(res).toStrictEqual({ kind: "hit", value: bytes.b() })
      })

      it("an empty value is a hit, not a miss", async () => {
        await cache.set(keys.one(), bytes.empty())

        const res = await cache.get(keys.one())

        expect(res).toStrictEqual({ kind: "hit", value: bytes.empty() })
      })

      it("set does not mutate the input Uint8Array", async () => {
        const value = bytes.a()

        await cache.set(keys.one(), value)

        expect(value).toStrictEqual(bytes.a())
      })

      it("keys do not interfere with each other", async () => {
        await cache.set(keys.one(), bytes.a())
        await cache.set(keys.two(), bytes.b())

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
        expect(await cache.get(keys.two())).toStrictEqual({ kind: "hit", value: bytes.b() })
        expect(await cache.get(keys.three())).toStrictEqual({ kind: "miss" })
      })
    })

    describe("exists", () => {
      it("is false for an absent key", async () => {
        expect(await cache.exists(keys.one())).toBe(false)
      })

      it("is true after set", async () => {
        await cache.set(keys.one(), bytes.a())

        expect(await cache.exists(keys.one())).toBe(true)
      })
    })

    describe("expire", () => {
      it("removes an existing key", async () => {
        await cache.set(keys.one(), bytes.a())

        const ok = await cache.expire(keys.one())

        expect(ok).toBe(true)
        expect(await cache.get(keys.one(), 0)).toStrictEqual({ kind: "miss" })
        expect(await cache.exists(keys.one(), 0)).toBe(false)
      })

      it("succeeds for an absent key", async () => {
        expect(await cache.expire("missing")).toBe(true)
      })

      it("is idempotent", async () => {
        await cache.set(keys.one(), bytes.a())

        expect(await cache.expire(keys.one())).toBe(true)
        expect(await cache.expire(keys.one())).toBe(true)
        expect(await cache.get(keys.one(), 0)).toStrictEqual({ kind: "miss" })
      })
    })

    describe("lifetimes", () => {
      it("serves entries younger than the read lifetime", async () => {
        await cache.set(keys.one(), bytes.a(), 100)
        clock.advanceSeconds(5)

        expect(await cache.get(keys.one(), 10)).toStrictEqual({ kind: "hit", value: bytes.a() })
      })

      it("treats entries older than the read lifetime as stale and removes them", async () => {
        await cache.set(keys.one(), bytes.a(), 100)
        clock.advanceSeconds(5)

        expect(await cache.get(keys.one(), 1)).toStrictEqual({ kind: "miss" })
        expect(await cache.get(keys.one(), 0)).toStrictEqual({ kind: "miss" })
      })

      it("defaults the read lifetime to one second", async () => {
        await cache.set(keys.one(), bytes.a(), 100)
        clock.advanceSeconds(1)

        expect(await cache.exists(keys.one())).toBe(true)

        clock.advance(1)

        expect(await cache.exists(keys.one())).toBe(false)
      })

      it("skips the read-time check for a read lifetime of 0", async () => {
        await cache.set(keys.one(), bytes.a(), 100)
        clock.advanceSeconds(50)

        expect(await cache.get(keys.one(), 0)).toStrictEqual({ kind: "hit", value: bytes.a() })
      })

      it("drops entries once their write lifetime has passed", async () => {
        await cache.set(keys.one(), bytes.a(), 10)
        clock.advanceSeconds(10)

        expect(await cache.get(keys.one(), 0)).toStrictEqual({ kind: "miss" })
      })

      it("keeps entries written with lifetime 0 whatever the read lifetime", async () => {
        await cache.set(keys.one(), bytes.a(), 0)
        clock.advanceSeconds(864_000)

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
        expect(await cache.get(keys.one(), 5)).toStrictEqual({ kind: "hit", value: bytes.a() })
        expect(await cache.exists(keys.one(), 5)).toBe(true)
      })

      it("uses the configured default for an unspecified write lifetime", async () => {
        const shortLived = h.make(clock, { lifetime: 60 })

        await shortLived.set(keys.one(), bytes.a())
        clock.advanceSeconds(59)

        expect(await shortLived.get(keys.one(), 60)).toStrictEqual({
          kind: "hit",
          value: bytes.a(),
        })

        clock.advanceSeconds(1)

        expect(await shortLived.get(keys.one(), 60)).toStrictEqual({ kind: "miss" })
      })

      it("rejects negative and fractional write lifetimes", async () => {
        await expect(cache.set(keys.one(), bytes.a(), -1)).rejects.toThrow(RangeError)
        await expect(cache.set(keys.one(), bytes.a(), 1.5)).rejects.toThrow(RangeError)
      })
    })

    describe("output", () => {
      it("writes a hit to the sink and reports true", async () => {
        const sink = new RecordingSink<Uint8Array>()
        await cache.set(keys.one(), bytes.a())

        const ok = await cache.output(keys.one(), sink)

        expect(ok).toBe(true)
        expect(sink.written).toStrictEqual([bytes.a()])
      })

      it("writes nothing on a miss and reports false", async () => {
        const sink = new RecordingSink<Uint8Array>()

        const ok = await cache.output(keys.one(), sink)

        expect(ok).toBe(false)
        expect(sink.written).toStrictEqual([])
      })

      it("applies the read lifetime", async () => {
        const sink = new RecordingSink<Uint8Array>()
        await cache.set(keys.one(), bytes.a(), 100)
        clock.advanceSeconds(30)

        expect(await cache.output(keys.one(), sink, 10)).toBe(false)
        expect(sink.written).toStrictEqual([])
      })
    })
  })
}
