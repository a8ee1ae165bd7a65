/**
 * A prefix that scopes a driver instance to a partition of a shared keyspace
 * (e.g. a Redis cluster).
 *
 * @remarks
 * Several drivers may target the same server with different prefixes:
 *
 * - `app:prod:cache:`
 * - `app:prod:sessions:`
 *
 * Drivers treat this value as an opaque string and prepend it to every key.
 */
export type KeyspacePrefix = string
