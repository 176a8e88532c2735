import type { AppError } from "./error"

export type Loaded<T> = {
  readonly kind: "loaded"
  readonly value: T
}

export type Failed = {
  readonly kind: "failed"
  readonly error: AppError
}

/**
 * Cached outcome for one item.
 *
 * @remarks
 * A `loaded` value may itself represent absence (e.g. `null` under a
 * `resolve` missing-item policy). A `failed` result is always an error and is
 * never confused with a valid "not found" value.
 */
export type LoadResult<T> = Loaded<T> | Failed

export function loaded<T>(value: T): Loaded<T> {
  return { kind: "loaded", value }
}

export function failed(error: AppError): Failed {
  return { kind: "failed", error }
}
