import { CacheConfigurationError } from "../errors"
import {
  assertLifetime,
  entryTimes,
  isFresh,
  isValidLifetime,
  resolveDefaultLifetime,
  resolveLifetime,
} from "../lifetime"

describe("lifetime helpers", () => {
  describe("isValidLifetime", () => {
    it.each([
      [0, true],
      [1, true],
      [86_400, true],
      [-1, false],
      [1.5, false],
      [Number.NaN, false],
    ])("%s -> %s", (lifetime, expected) => {
      expect(isValidLifetime(lifetime)).toBe(expected)
    })
  })

  describe("resolveDefaultLifetime", () => {
    it("falls back to one day", () => {
      expect(resolveDefaultLifetime(undefined)).toBe(86_400)
    })

    it("keeps an explicit zero", () => {
      expect(resolveDefaultLifetime(0)).toBe(0)
    })

    it("rejects invalid values as configuration errors", () => {
      expect(() => resolveDefaultLifetime(-10)).toThrow(CacheConfigurationError)
    })
  })

  describe("resolveLifetime", () => {
    it("substitutes the default only for an unspecified lifetime", () => {
      expect(resolveLifetime(undefined, 300)).toBe(300)
      expect(resolveLifetime(0, 300)).toBe(0)
      expect(resolveLifetime(5, 300)).toBe(5)
    })

    it("rejects invalid call-time values as range errors", () => {
      expect(() => resolveLifetime(-1, 300)).toThrow(RangeError)
      expect(() => assertLifetime(0.5)).toThrow(
        "Cache lifetime must be a non-negative integer of seconds, got 0.5",
      )
    })
  })

  describe("entryTimes", () => {
    it("records an expiry for positive lifetimes", () => {
      expect(entryTimes(1_000, 10)).toStrictEqual({ writtenAtMs: 1_000, expiresAtMs: 11_000 })
    })

    it("omits the expiry for lifetime 0", () => {
      expect(entryTimes(1_000, 0)).toStrictEqual({ writtenAtMs: 1_000 })
    })
  })

  describe("isFresh", () => {
    const times = { writtenAtMs: 1_000, expiresAtMs: 101_000 }

    it("accepts an entry exactly at the read lifetime boundary", () => {
      expect(isFresh(times, 5, 6_000)).toBe(true)
      expect(isFresh(times, 5, 6_001)).toBe(false)
    })

    it("drops an entry at its expiry regardless of read lifetime", () => {
      expect(isFresh(times, 0, 101_000)).toBe(false)
      expect(isFresh(times, 0, 100_999)).toBe(true)
    })

    it("never drops entries written with lifetime 0", () => {
      expect(isFresh({ writtenAtMs: 1_000 }, 5, 1_000_000_000)).toBe(true)
    })
  })
})
