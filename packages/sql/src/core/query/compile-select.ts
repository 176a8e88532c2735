import type { SelectQuery, SqlCondition } from "./select-query"

export type CompiledQuery = {
  readonly text: string
  readonly values: unknown[]
}

/**
 * Quote an identifier for Postgres. Dotted names are quoted per segment, so
 * `"app.users"` becomes `"app"."users"`.
 */
export function quoteIdentifier(name: string): string {
  return name
    .split(".")
    .map((part) => `"${part.replaceAll('"', '""')}"`)
    .join(".")
}

/**
 * Compile a query to Postgres text with positional parameters. Lists are
 * bound as a single array parameter (`= any($n)`).
 */
export function compileSelect(query: SelectQuery): CompiledQuery {
  const values: unknown[] = []

  const bind = (value: unknown): string => {
    values.push(value)
    return `$${values.length}`
  }

  const condition = (c: SqlCondition): string => {
    const column = quoteIdentifier(c.column)

    switch (c.kind) {
      case "eq":
        return `${column} = ${bind(c.value)}`
      case "in":
        return `${column} = any(${bind([...c.values])})`
      case "null":
        return `${column} is null`
    }
  }

  let text = `select * from ${quoteIdentifier(query.table)}`

  if (query.conditions.length > 0) {
    text += ` where ${query.conditions.map(condition).join(" and ")}`
  }

  if (query.order.length > 0) {
    text += ` order by ${query.order
      .map((o) => `${quoteIdentifier(o.column)} ${o.direction}`)
      .join(", ")}`
  }

  return { text, values }
}
