export type BatchReport = {
  readonly batchKey: string
  readonly items: number
  readonly outcome: "loaded" | "failed"
  readonly durationMs: number
}

export type SourceRunReport = {
  readonly batches: readonly BatchReport[]
}

export type RunReport = {
  readonly sources: Readonly<Record<string, SourceRunReport>>

  /** Fetch calls issued across all sources. */
  readonly batches: number

  /** Fetch calls that failed (rejected, timed out). */
  readonly failed: number

  readonly durationMs: number
}
