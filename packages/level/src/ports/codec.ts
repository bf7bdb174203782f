/**
 * Bidirectional transformation between a typed value and its byte form.
 *
 * Codecs are pure and deterministic. `decode` throws when the bytes are not
 * something `encode` could have produced (or an accepted spelling of it).
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}

/**
 * A codec that can also write its encoding after existing bytes.
 */
export interface AppendingCodec<T> extends Codec<T> {
  /**
   * Returns a new array holding `bytes` followed by the encoding of `value`.
   * `bytes` itself is left untouched.
   */
  append(bytes: Uint8Array, value: T): Uint8Array
}
