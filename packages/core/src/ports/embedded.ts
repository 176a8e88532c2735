export type EmbeddedResolved<V> = {
  readonly kind: "resolved"
  readonly value: V
}

export type EmbeddedUnresolved = {
  readonly kind: "unresolved"
}

export type EmbeddedLookup<V> = EmbeddedResolved<V> | EmbeddedUnresolved

/**
 * Pre-check run by `load` before queuing an item.
 *
 * Return `resolved` only when the item explicitly carries its already-loaded
 * value; the source then caches it and skips the fetch.
 */
export type ResolveEmbeddedFn<B, I, V> = (batchKey: B, item: I) => EmbeddedLookup<V>
