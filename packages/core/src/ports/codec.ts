/**
 * Bidirectional transform between a typed value and stored bytes.
 *
 * @remarks
 * Codecs should be pure. Plain JSON does not preserve `Date`, `Map`, `Set`,
 * `BigInt` or class instances; write a domain codec when that matters.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
