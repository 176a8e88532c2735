import type { Logger } from "@batchweave/logger"
import type { ItemKey } from "./item-key"

export type BatchFetchContext = {
  /** Aborted when the source's fetch timeout elapses. */
  readonly signal: AbortSignal

  /** Logger scoped to the source and batch key. */
  readonly logger: Logger
}

/**
 * Integrator-supplied function fetching one batch.
 *
 * @remarks
 * - `items` holds every distinct item queued for `batchKey` since the last
 *   run, in no particular order.
 * - Resolve with a map keyed by item key. Keys left out are settled by the
 *   source's missing-item policy; keys that were not requested are ignored.
 * - Reject (or throw) to fail the whole batch. The error is cached for every
 *   requested item.
 * - May run concurrently with other calls for different batch keys.
 */
export type BatchFetchFn<B, I, V> = (
  batchKey: B,
  items: readonly I[],
  ctx: BatchFetchContext,
) => Promise<ReadonlyMap<ItemKey, V>>
