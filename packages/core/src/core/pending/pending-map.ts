import type { BatchKeyId, ItemKey } from "../../ports/item-key"

export type PendingBatch<B, I> = {
  readonly id: BatchKeyId
  readonly batchKey: B
  readonly items: ReadonlyMap<ItemKey, I>
}

type MutableBatch<B, I> = {
  batchKey: B
  items: Map<ItemKey, I>
}

/**
 * Items queued since the last run, grouped by batch.
 *
 * Adding an item twice is a no-op; the first item object seen for a key is
 * the one handed to the fetch.
 */
export class PendingMap<B, I> {
  private batches = new Map<BatchKeyId, MutableBatch<B, I>>()

  add(batchId: BatchKeyId, batchKey: B, key: ItemKey, item: I): boolean {
    const batch = this.batches.get(batchId)

    if (!batch) {
      this.batches.set(batchId, { batchKey, items: new Map([[key, item]]) })
      return true
    }

    if (batch.items.has(key)) return false

    batch.items.set(key, item)
    return true
  }

  has(batchId: BatchKeyId, key: ItemKey): boolean {
    return this.batches.get(batchId)?.items.has(key) ?? false
  }

  /** Drop one queued item, and its batch once the batch is empty. */
  delete(batchId: BatchKeyId, key: ItemKey): boolean {
    const batch = this.batches.get(batchId)

    if (!batch?.items.delete(key)) return false
    if (batch.items.size === 0) this.batches.delete(batchId)

    return true
  }

  isEmpty(): boolean {
    return this.batches.size === 0
  }

  /** Total queued items across batches. */
  get size(): number {
    let total = 0

    for (const batch of this.batches.values()) total += batch.items.size

    return total
  }

  /**
   * Take every queued batch and leave the map empty.
   */
  drain(): PendingBatch<B, I>[] {
    const snapshot = [...this.batches].map(([id, batch]) => ({
      id,
      batchKey: batch.batchKey,
      items: batch.items,
    }))

    this.batches = new Map()

    return snapshot
  }
}
