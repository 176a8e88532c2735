/**
 * Identifies one requested entity within a batch.
 *
 * @remarks
 * Item keys are compared with `Map` semantics (SameValueZero), so `1` and `"1"`
 * are different keys. Sources that accept richer items (rows, records) derive
 * one of these through their `itemKey` function.
 */
export type ItemKey = string | number | bigint | boolean

/**
 * Normalized form of a batch (grouping) key, used to bucket pending items and
 * cache entries. Two batch keys with the same id are the same batch.
 */
export type BatchKeyId = string

export function isItemKey(value: unknown): value is ItemKey {
  switch (typeof value) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
      return true
    default:
      return false
  }
}
