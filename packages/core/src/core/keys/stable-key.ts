import { InvalidItemError } from "../errors/errors"

/**
 * Deterministic string form of a batch key.
 *
 * Objects are serialized with sorted keys, so `{ a: 1, b: 2 }` and
 * `{ b: 2, a: 1 }` produce the same key. Types stay distinguishable:
 * `1`, `"1"` and `1n` all differ. Properties set to `undefined` are skipped.
 *
 * @throws InvalidItemError for functions, symbols and non-plain objects other than Date.
 */
export function stableKey(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value)
    case "number":
      return Number.isFinite(value) ? String(value) : `#${String(value)}`
    case "bigint":
      return `${value}n`
    case "boolean":
      return String(value)
    case "undefined":
      return "undefined"
    case "object":
      return stableObjectKey(value)
    default:
      throw new InvalidItemError(`Cannot derive a key from a ${typeof value}`)
  }
}

function stableObjectKey(value: object | null): string {
  if (value === null) return "null"

  if (Array.isArray(value)) {
    return `[${value.map(stableKey).join(",")}]`
  }

  if (value instanceof Date) {
    return `@${value.toISOString()}`
  }

  const proto = Object.getPrototypeOf(value)

  if (proto !== Object.prototype && proto !== null) {
    throw new InvalidItemError(
      `Cannot derive a key from an instance of ${value.constructor.name}`,
    )
  }

  const parts = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableKey(v)}`)

  return `{${parts.join(",")}}`
}
