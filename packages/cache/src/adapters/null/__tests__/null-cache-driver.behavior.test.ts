import { RecordingSink } from "../../../tests/utils/recording-sink"
import { NullCacheDriver } from "../null-cache-driver"

describe("NullCacheDriver", () => {
  it("reports writes as successful but never stores them", async () => {
    const cache = new NullCacheDriver<string>()

    expect(await cache.set("k", "v")).toBe(true)
    expect(await cache.get("k", 0)).toStrictEqual({ kind: "miss" })
    expect(await cache.exists("k", 0)).toBe(false)
  })

  it("expire succeeds", async () => {
    expect(await new NullCacheDriver<string>().expire("k")).toBe(true)
  })

  it("output writes nothing", async () => {
    const sink = new RecordingSink<string>()

    expect(await new NullCacheDriver<string>().output("k", sink)).toBe(false)
    expect(sink.written).toStrictEqual([])
  })
})
