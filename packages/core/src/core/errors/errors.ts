import { LoaderError } from "./loader-error"

export type NotLoadedContext = {
  source?: string
  batchKey: string
  itemKey: string
  pending: boolean
}

/**
 * `get` was called for an item with no cached result. Reading before `run`
 * is a programmer error.
 */
export class NotLoadedError extends LoaderError<"not_loaded"> {
  constructor(context: NotLoadedContext) {
    super(
      context.pending
        ? `Item ${context.itemKey} in batch ${context.batchKey} is pending; call run() before get()`
        : `Item ${context.itemKey} in batch ${context.batchKey} was never loaded`,
      { code: "not_loaded", context, isOperational: false },
    )
  }
}

export type BatchContext = {
  source?: string
  batchKey: string
  items: number
}

/**
 * The fetch for a batch rejected. Cached for every item of the batch.
 */
export class BatchFetchError extends LoaderError<"batch_fetch_failed"> {
  constructor(context: BatchContext, cause: unknown) {
    super(`Fetching batch ${context.batchKey} failed: ${describeCause(cause)}`, {
      code: "batch_fetch_failed",
      context,
      cause,
    })
  }
}

export class FetchTimeoutError extends LoaderError<"fetch_timeout"> {
  constructor(timeoutMs: number) {
    super(`Fetch did not settle within ${timeoutMs}ms`, {
      code: "fetch_timeout",
      context: { timeoutMs },
    })
  }
}

export class MissingItemError extends LoaderError<"missing_item"> {
  constructor(context: { source?: string; batchKey: string; itemKey: string }) {
    super(`Batch ${context.batchKey} returned no result for item ${context.itemKey}`, {
      code: "missing_item",
      context,
    })
  }
}

export class UnknownSourceError extends LoaderError<"unknown_source"> {
  constructor(name: string, known: readonly string[]) {
    super(`No source registered under "${name}"`, {
      code: "unknown_source",
      context: { source: name, known: [...known] },
      isOperational: false,
    })
  }
}

export class DuplicateSourceError extends LoaderError<"duplicate_source"> {
  constructor(name: string) {
    super(`A source is already registered under "${name}"`, {
      code: "duplicate_source",
      context: { source: name },
      isOperational: false,
    })
  }
}

export class InvalidItemError extends LoaderError<"invalid_item"> {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, { code: "invalid_item", context, isOperational: false })
  }
}

export class InvalidConfigError extends LoaderError<"invalid_config"> {
  constructor(details: string) {
    super(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      isOperational: false,
    })
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  if (typeof cause === "string") return cause

  return "non-error value thrown"
}
