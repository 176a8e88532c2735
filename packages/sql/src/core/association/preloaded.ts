const ASSOCIATION_STATE = Symbol("batchweave.association")

/**
 * An association value the caller already holds. Placed on an owner row under
 * the association name, it lets `load` seed the cache instead of querying.
 */
export type Preloaded<V> = {
  readonly [ASSOCIATION_STATE]: "loaded"
  readonly value: V
}

/**
 * Placeholder for an association that was never fetched. Never cached.
 */
export type NotLoaded = {
  readonly [ASSOCIATION_STATE]: "not_loaded"
}

export function preloaded<V>(value: V): Preloaded<V> {
  return { [ASSOCIATION_STATE]: "loaded", value }
}

export function notLoaded(): NotLoaded {
  return { [ASSOCIATION_STATE]: "not_loaded" }
}

export function isPreloaded(value: unknown): value is Preloaded<unknown> {
  return stateOf(value) === "loaded"
}

export function isNotLoaded(value: unknown): value is NotLoaded {
  return stateOf(value) === "not_loaded"
}

function stateOf(value: unknown): unknown {
  if (typeof value !== "object" || value === null || !(ASSOCIATION_STATE in value)) {
    return undefined
  }

  return value[ASSOCIATION_STATE]
}
