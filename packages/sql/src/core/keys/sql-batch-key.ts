import type { Cardinality } from "../../ports/schema"

export type SqlParams = Readonly<Record<string, unknown>>

/**
 * Rows of `entity` looked up by a column; the items are column values.
 */
export type EntityBatchKey = {
  readonly kind: "entity"
  readonly entity: string

  /** Column matched against the items. The primary key when omitted. */
  readonly by?: string

  readonly cardinality: Cardinality
  readonly params: SqlParams
}

/**
 * Rows reached through an association of `owner`; the items are owner rows.
 */
export type AssocBatchKey = {
  readonly kind: "assoc"
  readonly owner: string
  readonly association: string
  readonly params: SqlParams
}

export type SqlBatchKey = EntityBatchKey | AssocBatchKey

export type EntityKeyOptions = {
  by?: string
  cardinality?: Cardinality
  params?: SqlParams
}

export function entity(name: string, options: EntityKeyOptions = {}): EntityBatchKey {
  return {
    kind: "entity",
    entity: name,
    ...(options.by !== undefined && { by: options.by }),
    cardinality: options.cardinality ?? "one",
    params: options.params ?? {},
  }
}

export function assoc(owner: string, association: string, params: SqlParams = {}): AssocBatchKey {
  return { kind: "assoc", owner, association, params }
}
