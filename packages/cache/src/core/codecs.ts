import superjson from "superjson"
import type { Codec } from "../ports/codec"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export const utf8Codec: Codec<string> = {
  encode(value) {
    return encoder.encode(value)
  },
  decode(bytes) {
    return decoder.decode(bytes)
  },
}

/**
 * JSON codec that round-trips `Date`, `Map`, `Set`, `BigInt` and `undefined`
 * through superjson.
 */
export function superjsonCodec<T>(): Codec<T> {
  return {
    encode(value) {
      return encoder.encode(superjson.stringify(value))
    },
    decode(bytes) {
      return superjson.parse<T>(decoder.decode(bytes))
    },
  }
}
