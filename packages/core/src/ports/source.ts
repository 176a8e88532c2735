import type { LoadResult } from "./load-result"
import type { SourceRunReport } from "./run-report"

/**
 * A Source owns one result cache, one set of pending batches and a way to
 * fetch them.
 *
 * @remarks
 * Mutating operations return `true` when they changed observable state and
 * `false` when they were no-ops (the item was already cached or already
 * queued). Loaders rely on this to detect fully cached loads.
 *
 * State per `(batchKey, item)`:
 * `unqueued -> pending` on `load`, `pending -> loaded | failed` on `run`,
 * `unqueued -> loaded` on `put`.
 *
 * @typeParam B - Batch (grouping) key, e.g. an entity tag or an association descriptor.
 * @typeParam I - Item as passed by callers, e.g. an id or an owner row.
 * @typeParam V - Resolved value.
 */
export interface Source<B, I, V> {
  /**
   * Queue `item` for the next run unless its result is already cached.
   */
  load(batchKey: B, item: I): boolean

  loadMany(batchKey: B, items: readonly I[]): boolean

  /**
   * Read a resolved value.
   *
   * @throws NotLoadedError if the item was never loaded, or loaded but not yet run.
   * @throws The cached error if the item's batch failed.
   */
  get(batchKey: B, item: I): V

  getMany(batchKey: B, items: readonly I[]): V[]

  /**
   * Read the cached result without throwing. `undefined` means not resolved yet.
   */
  peek(batchKey: B, item: I): LoadResult<V> | undefined

  /**
   * Set a cached value directly, bypassing pending state and the fetch.
   */
  put(batchKey: B, item: I, value: V): boolean

  hasPending(): boolean

  /**
   * Fetch every pending batch and merge the outcomes into the cache.
   *
   * @remarks
   * Fetch failures are cached, not thrown.
   */
  run(): Promise<SourceRunReport>
}

/**
 * Any source, regardless of its key and value types.
 */
export type UnknownSource = Source<never, never, unknown>

export type BatchKeyOf<S> = S extends Source<infer B, infer _I, infer _V> ? B : never

export type ItemOf<S> = S extends Source<infer _B, infer I, infer _V> ? I : never

export type ValueOf<S> = S extends Source<infer _B, infer _I, infer V> ? V : never
