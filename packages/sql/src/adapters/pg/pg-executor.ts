import type { SqlExecutor } from "../../ports/sql-executor"
import type { SqlRow } from "../../ports/sql-value"
import { compileSelect } from "../../core/query/compile-select"
import type { SelectQuery } from "../../core/query/select-query"

/**
 * The part of a `pg` pool or client the executor needs.
 */
export type PgQueryable = {
  query: (text: string, values?: unknown[]) => Promise<{ rows: Array<Record<string, unknown>> }>
}

export class PgExecutor implements SqlExecutor {
  constructor(private readonly client: PgQueryable) {}

  async select(query: SelectQuery): Promise<SqlRow[]> {
    const { text, values } = compileSelect(query)
    const result = await this.client.query(text, values)

    return result.rows
  }
}
