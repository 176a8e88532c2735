import type { BatchKeyId, ItemKey } from "../../ports/item-key"
import type { LoadResult } from "../../ports/load-result"

/**
 * Memoized results of one source, bucketed by batch.
 *
 * Entries are never evicted; they are replaced only by `put` or `merge`.
 */
export class ResultCache<V> {
  private readonly batches = new Map<BatchKeyId, Map<ItemKey, LoadResult<V>>>()
  private entries = 0

  get(batchId: BatchKeyId, key: ItemKey): LoadResult<V> | undefined {
    return this.batches.get(batchId)?.get(key)
  }

  has(batchId: BatchKeyId, key: ItemKey): boolean {
    return this.batches.get(batchId)?.has(key) ?? false
  }

  put(batchId: BatchKeyId, key: ItemKey, result: LoadResult<V>): void {
    const batch = this.batchFor(batchId)

    if (!batch.has(key)) this.entries++

    batch.set(key, result)
  }

  /**
   * Insert the outcome of one fetched batch.
   */
  merge(batchId: BatchKeyId, results: ReadonlyMap<ItemKey, LoadResult<V>>): void {
    if (results.size === 0) return

    const batch = this.batchFor(batchId)

    for (const [key, result] of results) {
      if (!batch.has(key)) this.entries++

      batch.set(key, result)
    }
  }

  get size(): number {
    return this.entries
  }

  private batchFor(batchId: BatchKeyId): Map<ItemKey, LoadResult<V>> {
    let batch = this.batches.get(batchId)

    if (!batch) {
      batch = new Map()
      this.batches.set(batchId, batch)
    }

    return batch
  }
}
