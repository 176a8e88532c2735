export type KvFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type KvNotFound = {
  readonly kind: "not_found"
}

export type KvResult<T> = KvFound<T> | KvNotFound

/**
 * Read side of a key-value store able to fetch many keys in one round-trip.
 */
export interface BulkKeyValueReader<T> {
  /**
   * Retrieve many values at once. Every requested key is present in the
   * returned map.
   */
  getMany(keys: readonly string[]): Promise<Map<string, KvResult<T>>>
}
