import type { Codec } from "../../ports/codec"

export function jsonCodec<T>(parse: (raw: unknown) => T): Codec<T> {
  return {
    encode: (value) => new TextEncoder().encode(JSON.stringify(value)),
    decode: (bytes) => parse(JSON.parse(new TextDecoder().decode(bytes))),
  }
}
