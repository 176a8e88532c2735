export type AssociationKind = "belongsTo" | "hasMany" | "hasOne"

export type Cardinality = "one" | "many"

export type AssociationDefinition = {
  kind: AssociationKind

  /** Name of the associated entity. */
  target: string

  /**
   * Column holding the reference. On the owner for `belongsTo`, on the target
   * for `hasMany` and `hasOne`. Defaults to `<entity>_id` in snake case.
   */
  foreignKey?: string
}

export type EntityDefinition = {
  table: string

  /** Defaults to `"id"`. */
  primaryKey?: string

  associations?: Record<string, AssociationDefinition>
}

export type SchemaDefinition = Record<string, EntityDefinition>

export type Association = {
  readonly name: string
  readonly kind: AssociationKind
  readonly owner: string
  readonly target: string
  readonly foreignKey: string
}

export type Entity = {
  readonly name: string
  readonly table: string
  readonly primaryKey: string
  readonly associations: ReadonlyMap<string, Association>
}
