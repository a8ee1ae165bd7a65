import { createClient, RESP_TYPES } from "redis"

export type RedisTtl = { EX: number } | { PX: number }

export type RedisBytesMulti = {
  set(key: string, value: Uint8Array | Buffer, opts?: RedisTtl): unknown
  del(keys: string | string[]): unknown
  exec(): Promise<unknown>
}

/**
 * The slice of a node-redis client the cache driver uses, with blob replies
 * mapped to `Buffer`.
 */
export type RedisBytesClient = {
  mGet(keys: string[]): Promise<(Buffer | null)[]>
  del(keys: string | string[]): Promise<number>
  multi(): RedisBytesMulti
}

export type ConnectableRedisBytesClient = RedisBytesClient & {
  connect(): Promise<unknown>
  quit(): Promise<unknown>
  isOpen: boolean
}

export function createRedisBytesClient(url: string): ConnectableRedisBytesClient {
  return createClient({ url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as ConnectableRedisBytesClient
}
