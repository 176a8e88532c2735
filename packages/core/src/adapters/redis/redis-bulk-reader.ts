import type { BulkKeyValueReader, KvResult } from "../../ports/bulk-reader"
import type { Codec } from "../../ports/codec"
import type { RedisMGetClient } from "./redis-client"

export type RedisBulkReaderOptions<V> = {
  codec: Codec<V>

  /**
   * Maximum keys per `MGET`. Larger requests are split so a single batch
   * cannot produce an oversized command.
   */
  batchSize?: number
}

const DEFAULT_BATCH_SIZE = 1_000

/**
 * Reads many keys with `MGET`, decoding each stored string with a codec.
 */
export class RedisBulkReader<V> implements BulkKeyValueReader<V> {
  private readonly batchSize: number

  constructor(
    private readonly client: RedisMGetClient,
    private readonly opts: RedisBulkReaderOptions<V>,
  ) {
    this.batchSize = opts.batchSize ?? DEFAULT_BATCH_SIZE
  }

  async getMany(keys: readonly string[]): Promise<Map<string, KvResult<V>>> {
    const out = new Map<string, KvResult<V>>()

    if (keys.length === 0) return out

    for (const chunk of this.chunks(keys)) {
      const values = await this.client.mGet(chunk)

      for (const [i, key] of chunk.entries()) {
        const raw = values[i] ?? null

        out.set(
          key,
          raw === null
            ? { kind: "not_found" }
            : { kind: "found", value: this.opts.codec.decode(new TextEncoder().encode(raw)) },
        )
      }
    }

    return out
  }

  private *chunks(keys: readonly string[]): Generator<string[]> {
    for (let i = 0; i < keys.length; i += this.batchSize) {
      yield keys.slice(i, i + this.batchSize)
    }
  }
}
