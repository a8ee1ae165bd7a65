/**
 * Destination for {@link CacheDriver.output}.
 *
 * Node `Writable` streams and HTTP responses satisfy this shape.
 */
export interface OutputSink<T> {
  write(value: T): unknown
}
