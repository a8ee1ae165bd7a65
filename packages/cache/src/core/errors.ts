import { BaseError, type ErrorContext, isAppError } from "@strata/errors"
import type { CacheKey } from "../ports/cache-key"

export type CacheOperation = "get" | "set" | "exists" | "expire"

/**
 * A driver or stack was built from unusable configuration: an empty or
 * missing stack, an unknown driver kind, invalid params or lifetimes.
 */
export class CacheConfigurationError extends BaseError<"cache_configuration"> {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, {
      code: "cache_configuration",
      isRetryable: false,
      ...(context && { context }),
      ...(cause !== undefined && { cause }),
    })
  }
}

export type CacheBackendErrorContext = {
  operation: CacheOperation
  key: CacheKey
  tier: number
}

/**
 * A stack member rejected. Raised for logging only; the stack absorbs it and
 * reports the member as missed or failed.
 *
 * Retryable unless the cause is an app error marked otherwise, such as a
 * closed nested stack.
 */
export class CacheBackendError extends BaseError<"cache_backend_failure"> {
  readonly details: Readonly<CacheBackendErrorContext>

  constructor(details: CacheBackendErrorContext, cause: unknown) {
    super(`Cache ${details.operation} failed on tier ${details.tier}`, {
      code: "cache_backend_failure",
      context: details,
      cause,
      isRetryable: isAppError(cause) ? cause.isRetryable : true,
    })

    this.details = Object.freeze({ ...details })
  }
}
