export { createPgPool } from "./adapters/pg/pg-pool"
export { PgExecutor, type PgQueryable } from "./adapters/pg/pg-executor"
export {
  isNotLoaded,
  isPreloaded,
  type NotLoaded,
  notLoaded,
  type Preloaded,
  preloaded,
} from "./core/association/preloaded"
export { SqlSchemaError } from "./core/errors/sql-schema-error"
export {
  type AssocBatchKey,
  assoc,
  type EntityBatchKey,
  type EntityKeyOptions,
  entity,
  type SqlBatchKey,
  type SqlParams,
} from "./core/keys/sql-batch-key"
export { type CompiledQuery, compileSelect, quoteIdentifier } from "./core/query/compile-select"
export {
  SelectQuery,
  type SortDirection,
  type SqlCondition,
  type SqlOrder,
} from "./core/query/select-query"
export { belongsTo, defineSchema, hasMany, hasOne, Schema } from "./core/schema/define-schema"
export {
  type SqlQueryContext,
  type SqlQueryHook,
  SqlSource,
  type SqlSourceOptions,
} from "./core/source/sql-source"
export type {
  Association,
  AssociationDefinition,
  AssociationKind,
  Cardinality,
  Entity,
  EntityDefinition,
  SchemaDefinition,
} from "./ports/schema"
export type { SqlExecutor } from "./ports/sql-executor"
export { isSqlRow, isSqlValue, type SqlItem, type SqlRow, type SqlValue } from "./ports/sql-value"
