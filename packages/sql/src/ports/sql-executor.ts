import type { SelectQuery } from "../core/query/select-query"
import type { SqlRow } from "./sql-value"

/**
 * Runs select queries against a database.
 *
 * Implementations receive the query as a value and decide how to execute it,
 * so the same source runs against Postgres or an in-memory table set.
 */
export interface SqlExecutor {
  select(query: SelectQuery): Promise<SqlRow[]>
}
