import type { BatchFetchFn } from "../../ports/batch-fetch"
import type { BulkKeyValueReader } from "../../ports/bulk-reader"
import type { ItemKey } from "../../ports/item-key"
import type { EntityTag } from "./kv-source"

export type KvStoreFetchOptions<V> = {
  reader: BulkKeyValueReader<V>

  /** Leading segment of every store key, e.g. "app". */
  keyspace?: string
}

/**
 * Key under which an entity is stored: `[keyspace:]tag:id`.
 */
export function entityStoreKey(tag: EntityTag, id: ItemKey, keyspace?: string): string {
  return keyspace ? `${keyspace}:${tag}:${String(id)}` : `${tag}:${String(id)}`
}

/**
 * Batch fetch reading every requested id of a tag in one `getMany` call.
 *
 * Ids the store does not hold are left out, so the source's missing-item
 * policy decides their outcome.
 */
export function kvStoreFetch<K extends ItemKey, V>(
  options: KvStoreFetchOptions<V>,
): BatchFetchFn<EntityTag, K, V> {
  return async (tag, ids) => {
    const keys = ids.map((id) => entityStoreKey(tag, id, options.keyspace))
    const stored = await options.reader.getMany(keys)

    const found = new Map<ItemKey, V>()

    for (const [i, id] of ids.entries()) {
      const result = stored.get(keys[i] ?? "")

      if (result?.kind === "found") found.set(id, result.value)
    }

    return found
  }
}
