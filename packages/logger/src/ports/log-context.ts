/**
 * Fields a loader attaches to its log entries.
 *
 * A batch entry usually carries `source`, `batchKey`, `items` and `durationMs`;
 * the rest are set once through `child()`.
 */
export type LogContext = {
  loader: string
  source: string
  batchKey: string
  items: number
  durationMs: number
  outcome: "loaded" | "failed"

  service: string
  module: string
  env: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
