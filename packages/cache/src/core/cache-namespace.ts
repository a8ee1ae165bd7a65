import type { CacheKey } from "../ports/cache-key"
import type { CacheNamespace } from "../ports/cache-namespace"
import { CacheConfigurationError } from "./errors"

const SEPARATOR = ":"

export function createCacheNamespace(prefix: string): CacheNamespace {
  if (prefix.length === 0) {
    throw new CacheConfigurationError("Cache namespace prefix must not be empty")
  }

  return {
    prefix,
    key(...parts: readonly (string | number)[]): CacheKey {
      return [prefix, ...parts].join(SEPARATOR)
    },
  }
}
