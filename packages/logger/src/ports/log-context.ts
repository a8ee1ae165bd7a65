/**
 * Well-known structured fields carried by cache log entries.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Cache operation being performed (get, set, exists, expire). */
  operation: string
  key: string

  /** Position of a driver inside a stack; 0 is the front. */
  tier: number
  driver: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
