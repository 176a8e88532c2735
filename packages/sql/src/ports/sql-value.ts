import type { ItemKey } from "@batchweave/core"

/**
 * A row as returned by the database driver, keyed by column name.
 */
export type SqlRow = Record<string, unknown>

/**
 * Item passed to `load`: a column value for entity lookups, an owner row for
 * association lookups.
 */
export type SqlItem = ItemKey | SqlRow

/**
 * Resolved value: one row (or `null`) for single results, rows for many.
 */
export type SqlValue = SqlRow | readonly SqlRow[] | null

export function isSqlRow(value: unknown): value is SqlRow {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function isSqlValue(value: unknown): value is SqlValue {
  if (value === null || isSqlRow(value)) return true

  return Array.isArray(value) && value.every(isSqlRow)
}
