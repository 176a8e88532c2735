import { createNullLogger, type Logger } from "@batchweave/logger"
import { systemClock } from "../../adapters/clock/system-clock"
import type { BatchFetchFn } from "../../ports/batch-fetch"
import type { Clock } from "../../ports/clock"
import type { ResolveEmbeddedFn } from "../../ports/embedded"
import { type BatchKeyId, type ItemKey, isItemKey } from "../../ports/item-key"
import { failed, type LoadResult, loaded } from "../../ports/load-result"
import type { MissingItemPolicy } from "../../ports/missing-item-policy"
import type { BatchReport, SourceRunReport } from "../../ports/run-report"
import type { Source } from "../../ports/source"
import { ResultCache } from "../cache/result-cache"
import { mapWithConcurrency } from "../concurrency/map-with-concurrency"
import { withTimeout } from "../concurrency/with-timeout"
import {
  BatchFetchError,
  InvalidConfigError,
  InvalidItemError,
  MissingItemError,
  NotLoadedError,
} from "../errors/errors"
import { stableKey } from "../keys/stable-key"
import { type PendingBatch, PendingMap } from "../pending/pending-map"

export type BatchSourceOptions<B, I, V> = {
  fetch: BatchFetchFn<B, I, V>

  /** Label used in logs, reports and error context. */
  name?: string

  /**
   * Derive the cache key of an item. Defaults to the item itself, which only
   * works for primitive items.
   */
  itemKey?: (item: I, batchKey: B) => ItemKey

  /** Normalize a batch key. Defaults to `stableKey`. */
  batchKey?: (batchKey: B) => BatchKeyId

  /** Settles items a fetch left out. Defaults to `{ kind: "fail" }`. */
  missing?: MissingItemPolicy<V>

  resolveEmbedded?: ResolveEmbeddedFn<B, I, V>

  /** Per-fetch timeout. Unbounded when omitted. */
  timeoutMs?: number

  /** Fetches allowed in flight during one run. Unbounded when omitted. */
  maxConcurrency?: number
}

export type BatchSourceDeps = {
  logger?: Logger
  clock?: Clock
}

type BatchOutcome<V> = {
  id: BatchKeyId
  results: Map<ItemKey, LoadResult<V>>
  report: BatchReport
}

/**
 * Source driven by a user-supplied batch fetch function.
 *
 * @example
 * ```ts
 * const users = new BatchSource({
 *   fetch: async (_tag, ids: readonly number[]) => {
 *     const rows = await db.users.findMany({ id: ids })
 *     return new Map(rows.map((u) => [u.id, u]))
 *   },
 * })
 *
 * users.loadMany("User", [1, 2])
 * await users.run()
 * users.get("User", 1)
 * ```
 */
export class BatchSource<B, I, V> implements Source<B, I, V> {
  private readonly cache = new ResultCache<V>()
  private readonly pending = new PendingMap<B, I>()
  private readonly logger: Logger
  private readonly clock: Clock

  constructor(
    private readonly opts: BatchSourceOptions<B, I, V>,
    deps: BatchSourceDeps = {},
  ) {
    assertLimits(opts)

    const logger = deps.logger ?? createNullLogger()

    this.logger = opts.name !== undefined ? logger.child({ source: opts.name }) : logger
    this.clock = deps.clock ?? systemClock
  }

  load(batchKey: B, item: I): boolean {
    const id = this.batchIdOf(batchKey)
    const key = this.itemKeyOf(item, batchKey)

    if (this.cache.has(id, key)) return false

    if (this.opts.resolveEmbedded) {
      const embedded = this.opts.resolveEmbedded(batchKey, item)

      if (embedded.kind === "resolved") {
        this.cache.put(id, key, loaded(embedded.value))
        this.pending.delete(id, key)
        return true
      }
    }

    return this.pending.add(id, batchKey, key, item)
  }

  loadMany(batchKey: B, items: readonly I[]): boolean {
    let changed = false

    for (const item of items) {
      if (this.load(batchKey, item)) changed = true
    }

    return changed
  }

  get(batchKey: B, item: I): V {
    const id = this.batchIdOf(batchKey)
    const key = this.itemKeyOf(item, batchKey)
    const result = this.cache.get(id, key)

    if (!result) {
      throw new NotLoadedError({
        ...this.sourceContext(),
        batchKey: id,
        itemKey: String(key),
        pending: this.pending.has(id, key),
      })
    }

    if (result.kind === "failed") throw result.error

    return result.value
  }

  getMany(batchKey: B, items: readonly I[]): V[] {
    return items.map((item) => this.get(batchKey, item))
  }

  peek(batchKey: B, item: I): LoadResult<V> | undefined {
    return this.cache.get(this.batchIdOf(batchKey), this.itemKeyOf(item, batchKey))
  }

  put(batchKey: B, item: I, value: V): boolean {
    this.cache.put(this.batchIdOf(batchKey), this.itemKeyOf(item, batchKey), loaded(value))

    return true
  }

  hasPending(): boolean {
    return !this.pending.isEmpty()
  }

  async run(): Promise<SourceRunReport> {
    // Items cached after they were queued (a put, or a run that was already
    // in flight) are not fetched again.
    const batches = this.pending.drain().flatMap((batch) => this.withoutCached(batch))

    if (batches.length === 0) return { batches: [] }

    const outcomes = await mapWithConcurrency(
      batches,
      this.opts.maxConcurrency ?? Number.POSITIVE_INFINITY,
      (batch) => this.fetchBatch(batch),
    )

    // Batch ids partition the key space, so merging after the join cannot conflict.
    for (const outcome of outcomes) {
      this.cache.merge(outcome.id, outcome.results)
    }

    return { batches: outcomes.map((o) => o.report) }
  }

  private async fetchBatch(batch: PendingBatch<B, I>): Promise<BatchOutcome<V>> {
    const startedAt = this.clock.nowMs()
    const items = [...batch.items.values()]
    const logger = this.logger.child({ batchKey: batch.id })

    try {
      const found = await withTimeout(
        (signal) => this.opts.fetch(batch.batchKey, items, { signal, logger }),
        this.opts.timeoutMs,
      )

      const results = this.settle(batch, found)
      const durationMs = this.clock.nowMs() - startedAt

      logger.debug("batch loaded", { items: items.length, durationMs, outcome: "loaded" })

      return {
        id: batch.id,
        results,
        report: { batchKey: batch.id, items: items.length, outcome: "loaded", durationMs },
      }
    } catch (err) {
      const error = new BatchFetchError(
        {
          ...this.sourceContext(),
          batchKey: batch.id,
          items: items.length,
        },
        err,
      )
      const durationMs = this.clock.nowMs() - startedAt

      logger.warn("batch failed", { items: items.length, durationMs, outcome: "failed", err })

      const results = new Map<ItemKey, LoadResult<V>>()
      for (const key of batch.items.keys()) results.set(key, failed(error))

      return {
        id: batch.id,
        results,
        report: { batchKey: batch.id, items: items.length, outcome: "failed", durationMs },
      }
    }
  }

  private settle(
    batch: PendingBatch<B, I>,
    found: ReadonlyMap<ItemKey, V>,
  ): Map<ItemKey, LoadResult<V>> {
    const results = new Map<ItemKey, LoadResult<V>>()

    for (const [key, value] of found) {
      if (batch.items.has(key)) results.set(key, loaded(value))
    }

    const missing: MissingItemPolicy<V> = this.opts.missing ?? { kind: "fail" }

    for (const key of batch.items.keys()) {
      if (results.has(key)) continue

      results.set(
        key,
        missing.kind === "resolve"
          ? loaded(missing.value)
          : failed(
              new MissingItemError({
                ...this.sourceContext(),
                batchKey: batch.id,
                itemKey: String(key),
              }),
            ),
      )
    }

    return results
  }

  private sourceContext(): { source?: string } {
    return this.opts.name === undefined ? {} : { source: this.opts.name }
  }

  private withoutCached(batch: PendingBatch<B, I>): PendingBatch<B, I>[] {
    const items = new Map<ItemKey, I>()

    for (const [key, item] of batch.items) {
      if (!this.cache.has(batch.id, key)) items.set(key, item)
    }

    return items.size === 0 ? [] : [{ ...batch, items }]
  }

  private batchIdOf(batchKey: B): BatchKeyId {
    return this.opts.batchKey ? this.opts.batchKey(batchKey) : stableKey(batchKey)
  }

  private itemKeyOf(item: I, batchKey: B): ItemKey {
    if (this.opts.itemKey) return this.opts.itemKey(item, batchKey)

    if (isItemKey(item)) return item

    throw new InvalidItemError(
      "Items must be strings, numbers, bigints or booleans unless the source defines itemKey",
      { ...this.sourceContext(), received: typeof item },
    )
  }
}

function assertLimits(
  opts: Pick<BatchSourceOptions<unknown, unknown, unknown>, "maxConcurrency" | "timeoutMs">,
): void {
  const { maxConcurrency, timeoutMs } = opts

  if (
    maxConcurrency !== undefined &&
    maxConcurrency !== Number.POSITIVE_INFINITY &&
    !(Number.isInteger(maxConcurrency) && maxConcurrency >= 1)
  ) {
    throw new InvalidConfigError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`)
  }

  if (timeoutMs !== undefined && !(Number.isFinite(timeoutMs) && timeoutMs > 0)) {
    throw new InvalidConfigError(`timeoutMs must be a positive finite number, got ${timeoutMs}`)
  }
}
