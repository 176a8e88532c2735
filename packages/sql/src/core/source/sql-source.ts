import {
  type BatchFetchContext,
  BatchSource,
  type BatchSourceDeps,
  type EmbeddedLookup,
  InvalidItemError,
  type ItemKey,
  isItemKey,
  type LoadResult,
  type Source,
  type SourceRunReport,
} from "@batchweave/core"
import type { Entity } from "../../ports/schema"
import type { SqlExecutor } from "../../ports/sql-executor"
import { isSqlRow, isSqlValue, type SqlItem, type SqlRow, type SqlValue } from "../../ports/sql-value"
import { isNotLoaded, isPreloaded } from "../association/preloaded"
import type { AssocBatchKey, EntityBatchKey, SqlBatchKey, SqlParams } from "../keys/sql-batch-key"
import { SelectQuery } from "../query/select-query"
import type { Schema } from "../schema/define-schema"

export type SqlQueryContext = {
  /** Entity whose table is being queried. */
  entity: string
  params: SqlParams
}

/**
 * Customizes the base query of a batch, e.g. to apply params, scopes or an
 * ordering. Lookup conditions are added afterwards.
 */
export type SqlQueryHook = (query: SelectQuery, ctx: SqlQueryContext) => SelectQuery

export type SqlSourceOptions = {
  schema: Schema
  executor: SqlExecutor
  name?: string

  /** Without a hook, params are applied as equality filters. */
  query?: SqlQueryHook

  /**
   * Outcome of single lookups that match no row. Many lookups always
   * resolve to `[]`. Default `"null"`.
   */
  missing?: "null" | "fail"

  timeoutMs?: number
  maxConcurrency?: number
}

type SqlResults = Map<ItemKey, SqlValue>

/**
 * Source loading rows and associations with one query per batch key.
 *
 * @example
 * ```ts
 * const repo = new SqlSource({ schema, executor: new PgExecutor(pool) })
 * const loader = createLoader({ sources: { repo } })
 *
 * await loader.load("repo", assoc("Post", "user"), post).run()
 * const author = loader.get("repo", assoc("Post", "user"), post)
 * ```
 */
export class SqlSource implements Source<SqlBatchKey, SqlItem, SqlValue> {
  private readonly inner: BatchSource<SqlBatchKey, SqlItem, SqlValue>

  constructor(
    private readonly opts: SqlSourceOptions,
    deps: BatchSourceDeps = {},
  ) {
    this.inner = new BatchSource<SqlBatchKey, SqlItem, SqlValue>(
      {
        name: opts.name,
        timeoutMs: opts.timeoutMs,
        maxConcurrency: opts.maxConcurrency,
        missing: opts.missing === "fail" ? { kind: "fail" } : { kind: "resolve", value: null },
        itemKey: (item, batchKey) => this.itemKeyOf(item, batchKey),
        resolveEmbedded: (batchKey, item) => this.embedded(batchKey, item),
        fetch: (batchKey, items, ctx) =>
          batchKey.kind === "entity"
            ? this.fetchEntities(batchKey, items, ctx)
            : this.fetchAssociation(batchKey, items, ctx),
      },
      deps,
    )
  }

  load(batchKey: SqlBatchKey, item: SqlItem): boolean {
    return this.inner.load(batchKey, item)
  }

  loadMany(batchKey: SqlBatchKey, items: readonly SqlItem[]): boolean {
    return this.inner.loadMany(batchKey, items)
  }

  get(batchKey: SqlBatchKey, item: SqlItem): SqlValue {
    return this.inner.get(batchKey, item)
  }

  getMany(batchKey: SqlBatchKey, items: readonly SqlItem[]): SqlValue[] {
    return this.inner.getMany(batchKey, items)
  }

  peek(batchKey: SqlBatchKey, item: SqlItem): LoadResult<SqlValue> | undefined {
    return this.inner.peek(batchKey, item)
  }

  /**
   * Warm the cache. A `notLoaded()` placeholder is ignored and returns `false`.
   */
  put(batchKey: SqlBatchKey, item: SqlItem, value: SqlValue): boolean {
    if (isNotLoaded(value)) return false

    return this.inner.put(batchKey, item, value)
  }

  hasPending(): boolean {
    return this.inner.hasPending()
  }

  run(): Promise<SourceRunReport> {
    return this.inner.run()
  }

  private itemKeyOf(item: SqlItem, batchKey: SqlBatchKey): ItemKey {
    if (batchKey.kind === "entity") {
      if (!isItemKey(item)) {
        throw new InvalidItemError(`Items of entity ${batchKey.entity} must be column values`, {
          entity: batchKey.entity,
        })
      }

      return String(item)
    }

    if (isItemKey(item)) {
      throw new InvalidItemError(
        `Items of ${batchKey.owner}.${batchKey.association} must be ${batchKey.owner} rows`,
        { entity: batchKey.owner, association: batchKey.association },
      )
    }

    return this.rowKey(this.opts.schema.entity(batchKey.owner), item)
  }

  private embedded(batchKey: SqlBatchKey, item: SqlItem): EmbeddedLookup<SqlValue> {
    // An embedded value stands in for the plain association only, never a parameterized one.
    if (batchKey.kind !== "assoc" || Object.keys(batchKey.params).length > 0 || isItemKey(item)) {
      return { kind: "unresolved" }
    }

    const held = item[batchKey.association]

    if (isPreloaded(held) && isSqlValue(held.value)) {
      return { kind: "resolved", value: held.value }
    }

    return { kind: "unresolved" }
  }

  private async fetchEntities(
    batchKey: EntityBatchKey,
    items: readonly SqlItem[],
    ctx: BatchFetchContext,
  ): Promise<SqlResults> {
    const entity = this.opts.schema.entity(batchKey.entity)
    const column = batchKey.by ?? entity.primaryKey
    const values = items.filter(isItemKey)

    const rows = await this.select(entity, batchKey.params, ctx, (q) => q.whereIn(column, values))

    return batchKey.cardinality === "many"
      ? groupMany(rows, column, values)
      : groupOne(rows, column)
  }

  private async fetchAssociation(
    batchKey: AssocBatchKey,
    items: readonly SqlItem[],
    ctx: BatchFetchContext,
  ): Promise<SqlResults> {
    const { schema } = this.opts
    const association = schema.association(batchKey.owner, batchKey.association)
    const owner = schema.entity(batchKey.owner)
    const target = schema.entity(association.target)
    const owners = items.filter(isSqlRow)

    if (association.kind === "belongsTo") {
      const results: SqlResults = new Map()
      const refs = new Set<ItemKey>()

      for (const row of owners) {
        const ref = row[association.foreignKey]

        if (ref === null || ref === undefined) results.set(this.rowKey(owner, row), null)
        else if (isItemKey(ref)) refs.add(ref)
      }

      if (refs.size === 0) return results

      const rows = await this.select(target, batchKey.params, ctx, (q) =>
        q.whereIn(target.primaryKey, [...refs]),
      )
      const byId = groupOne(rows, target.primaryKey)

      for (const row of owners) {
        const found = byId.get(String(row[association.foreignKey]))

        if (found !== undefined) results.set(this.rowKey(owner, row), found)
      }

      return results
    }

    const ids = owners.map((row) => row[owner.primaryKey]).filter(isItemKey)
    const rows = await this.select(target, batchKey.params, ctx, (q) =>
      q.whereIn(association.foreignKey, ids),
    )

    return association.kind === "hasMany"
      ? groupMany(rows, association.foreignKey, ids)
      : groupOne(rows, association.foreignKey)
  }

  private async select(
    entity: Entity,
    params: SqlParams,
    ctx: BatchFetchContext,
    lookup: (query: SelectQuery) => SelectQuery,
  ): Promise<SqlRow[]> {
    const base = SelectQuery.from(entity.table)
    const shaped = this.opts.query
      ? this.opts.query(base, { entity: entity.name, params })
      : applyParams(base, params)

    ctx.logger.trace("querying", { table: entity.table })

    return await this.opts.executor.select(lookup(shaped))
  }

  private rowKey(entity: Entity, row: SqlRow): string {
    const id = row[entity.primaryKey]

    if (!isItemKey(id)) {
      throw new InvalidItemError(`${entity.name} row has no usable primary key "${entity.primaryKey}"`, {
        entity: entity.name,
      })
    }

    return String(id)
  }
}

function applyParams(query: SelectQuery, params: SqlParams): SelectQuery {
  let shaped = query

  for (const [column, value] of Object.entries(params)) {
    shaped = shaped.where(column, value)
  }

  return shaped
}

function groupOne(rows: readonly SqlRow[], column: string): SqlResults {
  const results: SqlResults = new Map()

  for (const row of rows) {
    const key = String(row[column])
    if (!results.has(key)) results.set(key, row)
  }

  return results
}

function groupMany(rows: readonly SqlRow[], column: string, ids: readonly ItemKey[]): SqlResults {
  const grouped = new Map<string, SqlRow[]>()

  for (const id of ids) grouped.set(String(id), [])

  for (const row of rows) {
    grouped.get(String(row[column]))?.push(row)
  }

  return new Map<ItemKey, SqlValue>(grouped)
}
