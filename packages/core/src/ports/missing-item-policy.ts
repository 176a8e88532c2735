/**
 * How a source settles items a fetch did not return.
 *
 * - `fail`: cache a `MissingItemError` for the item.
 * - `resolve`: cache `value` as a successful result (e.g. `null`).
 */
export type MissingItemPolicy<V> =
  | { readonly kind: "fail" }
  | { readonly kind: "resolve"; readonly value: V }
