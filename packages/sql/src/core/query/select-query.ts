export type SqlCondition =
  | { readonly kind: "eq"; readonly column: string; readonly value: unknown }
  | { readonly kind: "in"; readonly column: string; readonly values: readonly unknown[] }
  | { readonly kind: "null"; readonly column: string }

export type SortDirection = "asc" | "desc"

export type SqlOrder = {
  readonly column: string
  readonly direction: SortDirection
}

/**
 * Immutable `select * from <table>` with AND-ed conditions and an ordering.
 * Every builder method returns a new query.
 */
export class SelectQuery {
  private constructor(
    readonly table: string,
    readonly conditions: readonly SqlCondition[],
    readonly order: readonly SqlOrder[],
  ) {}

  static from(table: string): SelectQuery {
    return new SelectQuery(table, [], [])
  }

  /** `column = value`; a `null` value compiles to `column is null`. */
  where(column: string, value: unknown): SelectQuery {
    if (value === null) return this.whereNull(column)

    return this.and({ kind: "eq", column, value })
  }

  whereIn(column: string, values: readonly unknown[]): SelectQuery {
    return this.and({ kind: "in", column, values: [...values] })
  }

  whereNull(column: string): SelectQuery {
    return this.and({ kind: "null", column })
  }

  orderBy(column: string, direction: SortDirection = "asc"): SelectQuery {
    return new SelectQuery(this.table, this.conditions, [...this.order, { column, direction }])
  }

  private and(condition: SqlCondition): SelectQuery {
    return new SelectQuery(this.table, [...this.conditions, condition], this.order)
  }
}
