import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigValidationError, loadConfig } from "../load"

const schema = z.object({
  CACHE_LIFETIME: z.coerce.number().int().min(0).default(86_400),
  CACHE_PREFIX: z.string().default("app:"),
})

describe("loadConfig", () => {
  it("applies schema defaults when no source provides a value", async () => {
    const config = await loadConfig({ schema, sources: [new EnvSource({ env: {} })] })

    expect(config.value).toStrictEqual({ CACHE_LIFETIME: 86_400, CACHE_PREFIX: "app:" })
    expect(config.explain("CACHE_LIFETIME")).toBe("default")
  })

  it("later sources override earlier ones and provenance follows", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { CACHE_LIFETIME: "60", CACHE_PREFIX: "env:" } }),
        new ObjectSource({ CACHE_LIFETIME: 5 }),
      ],
    })

    expect(config.get("CACHE_LIFETIME")).toBe(5)
    expect(config.get("CACHE_PREFIX")).toBe("env:")
    expect(config.explain("CACHE_LIFETIME")).toBe("object:overrides")
    expect(config.explain("CACHE_PREFIX")).toBe("env")
  })

  it("ignores undefined values from a source", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ CACHE_LIFETIME: 10 }, "first"),
        new ObjectSource({ CACHE_LIFETIME: undefined }, "second"),
      ],
    })

    expect(config.get("CACHE_LIFETIME")).toBe(10)
    expect(config.explain("CACHE_LIFETIME")).toBe("first")
  })

  it("reports keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ CACHE_LIFETMIE: "1" })],
    })

    expect(config.unknownKeys()).toStrictEqual(["CACHE_LIFETMIE"])
  })

  it("throws ConfigValidationError on invalid input", async () => {
    const promise = loadConfig({
      schema,
      sources: [new ObjectSource({ CACHE_LIFETIME: "-1" })],
    })

    await expect(promise).rejects.toBeInstanceOf(ConfigValidationError)
    await expect(promise).rejects.toMatchObject({ code: "config_validation" })
  })
})
