import { FakeClock } from "@strata/clock"
import { ConfigValidationError, EnvSource, ObjectSource } from "@strata/config"
import { MemoryCacheDriver } from "../../adapters/memory/memory-cache-driver"
import { NullCacheDriver } from "../../adapters/null/null-cache-driver"
import { createCacheFromConfig, loadCacheConfig } from "../cache-config"

describe("loadCacheConfig", () => {
  it("applies defaults when nothing is configured", async () => {
    const config = await loadCacheConfig([new EnvSource({ env: {} })])

    expect(config).toStrictEqual({
      CACHE_LIFETIME: 86_400,
      CACHE_STACK: [{ driver: "memory" }],
      CACHE_MEMORY_MAX_ENTRIES: 10_000,
    })
  })

  it("parses environment strings, including the JSON stack", async () => {
    const config = await loadCacheConfig([
      new EnvSource({
        env: {
          CACHE_LIFETIME: "300",
          CACHE_STACK: '[{"driver":"memory","params":{"maxEntries":5}},{"driver":"null"}]',
          CACHE_MEMORY_MAX_ENTRIES: "50",
        },
      }),
    ])

    expect(config).toStrictEqual({
      CACHE_LIFETIME: 300,
      CACHE_STACK: [{ driver: "memory", params: { maxEntries: 5 } }, { driver: "null" }],
      CACHE_MEMORY_MAX_ENTRIES: 50,
    })
  })

  it("accepts an already-structured stack from an object source", async () => {
    const config = await loadCacheConfig([new ObjectSource({ CACHE_STACK: [{ driver: "null" }] })])

    expect(config.CACHE_STACK).toStrictEqual([{ driver: "null" }])
  })

  it.each([
    ["malformed JSON", { CACHE_STACK: "[{driver:" }],
    ["an empty stack", { CACHE_STACK: "[]" }],
    ["a negative lifetime", { CACHE_LIFETIME: "-1" }],
    ["a zero entry limit", { CACHE_MEMORY_MAX_ENTRIES: "0" }],
  ])("rejects %s", async (_label, env) => {
    await expect(loadCacheConfig([new EnvSource({ env })])).rejects.toThrow(ConfigValidationError)
  })
})

describe("createCacheFromConfig", () => {
  it("builds the configured stack with the configured defaults", () => {
    const stack = createCacheFromConfig(
      {
        CACHE_LIFETIME: 300,
        CACHE_STACK: [{ driver: "memory" }, { driver: "null" }],
        CACHE_MEMORY_MAX_ENTRIES: 50,
      },
      { clock: new FakeClock() },
    )

    expect(stack.lifetime).toBe(300)
    expect(stack.drivers[0]).toBeInstanceOf(MemoryCacheDriver)
    expect(stack.drivers[0]).toMatchObject({ lifetime: 300 })
    expect(stack.master).toBeInstanceOf(NullCacheDriver)
  })
})
