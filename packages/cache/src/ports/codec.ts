/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and bytes.
 *
 * @remarks
 * Codecs sit between typed cache usage and byte-oriented drivers. They should
 * be pure and deterministic; drivers treat codec output as opaque bytes.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
