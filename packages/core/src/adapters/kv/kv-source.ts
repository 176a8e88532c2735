import type { BatchFetchFn } from "../../ports/batch-fetch"
import type { ItemKey } from "../../ports/item-key"
import type { MissingItemPolicy } from "../../ports/missing-item-policy"
import {
  BatchSource,
  type BatchSourceDeps,
  type BatchSourceOptions,
} from "../../core/source/batch-source"

/**
 * Batch key of a KV source: the tag of the entity type being loaded.
 */
export type EntityTag = string

export type KvSourceOptions<V> = Pick<
  BatchSourceOptions<EntityTag, ItemKey, V>,
  "name" | "timeoutMs" | "maxConcurrency"
> & {
  missing?: MissingItemPolicy<V>
}

/**
 * Source loading entities by primary identifier, one fetch per entity tag.
 *
 * @example
 * ```ts
 * const users = createKvSource<number, User>(async (_tag, ids) => {
 *   const rows = await api.users.byIds(ids)
 *   return new Map(rows.map((u) => [u.id, u]))
 * })
 *
 * users.loadMany("User", [1, 2])
 * await users.run()
 * ```
 */
export function createKvSource<K extends ItemKey, V>(
  fetch: BatchFetchFn<EntityTag, K, V>,
  options: KvSourceOptions<V> = {},
  deps: BatchSourceDeps = {},
): BatchSource<EntityTag, K, V> {
  return new BatchSource<EntityTag, K, V>({ ...options, fetch }, deps)
}
