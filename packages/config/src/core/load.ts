import { BaseError } from "@strata/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export class ConfigValidationError extends BaseError<"config_validation"> {
  constructor(message: string, cause: unknown) {
    super(message, { code: "config_validation", cause, isRetryable: false })
  }
}

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources?: readonly ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      result.error,
    )
  }

  const known: Record<string, string> = {}

  for (const key of Object.keys(result.data)) {
    known[key] = provenance[key] ?? "default"
  }

  return new Config<T>(result.data, known, new Set(Object.keys(merged)))
}
