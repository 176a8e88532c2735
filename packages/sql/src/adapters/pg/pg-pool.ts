import pg from "pg"

export function createPgPool(options: { connectionString: string }): pg.Pool {
  return new pg.Pool({
    connectionString: options.connectionString,
  })
}
