import { createNullLogger, type Logger } from "@batchweave/logger"
import { systemClock } from "../../adapters/clock/system-clock"
import type { Clock } from "../../ports/clock"
import type { LoadResult } from "../../ports/load-result"
import type { RunReport, SourceRunReport } from "../../ports/run-report"
import type {
  BatchKeyOf,
  ItemOf,
  Source,
  UnknownSource,
  ValueOf,
} from "../../ports/source"
import { DuplicateSourceError, UnknownSourceError } from "../errors/errors"
import { LoaderError } from "../errors/loader-error"

export type SourceRegistry = Record<string, UnknownSource>

export type SourceName<TSources extends SourceRegistry> = keyof TSources & string

type SourceAt<TSources extends SourceRegistry, N extends SourceName<TSources>> = Source<
  BatchKeyOf<TSources[N]>,
  ItemOf<TSources[N]>,
  ValueOf<TSources[N]>
>

export type LoaderDeps = {
  logger?: Logger
  clock?: Clock
}

export type LoaderOptions<TSources extends SourceRegistry> = LoaderDeps & {
  /** Label for log entries. */
  name?: string
  sources?: TSources
}

type ResolvedDeps = {
  logger: Logger
  clock: Clock
  name: string
}

/**
 * Coordinates named sources for one workflow.
 *
 * @remarks
 * `load`, `loadMany` and `put` return the loader for chaining and bump
 * `revision` only when a source actually changed, so loading fully cached
 * items is observably a no-op. Nothing is fetched until `run()`.
 *
 * A loader is meant to live for one workflow (a request, a job) and then be
 * discarded; results are never shared across loaders.
 *
 * @example
 * ```ts
 * const loader = createLoader({ sources: { users: usersSource } })
 *
 * await loader.loadMany("users", "User", [1, 2]).run()
 * const [ben, andy] = loader.getMany("users", "User", [1, 2])
 * ```
 */
export class Loader<TSources extends SourceRegistry = SourceRegistry> {
  private revisionCount = 0

  private constructor(
    private readonly sources: ReadonlyMap<string, UnknownSource>,
    private readonly deps: ResolvedDeps,
  ) {}

  static create<TSources extends SourceRegistry = Record<never, never>>(
    options: LoaderOptions<TSources> = {},
  ): Loader<TSources> {
    const name = options.name ?? "loader"

    return new Loader<TSources>(new Map(Object.entries(options.sources ?? {})), {
      name,
      logger: (options.logger ?? createNullLogger()).child({ loader: name }),
      clock: options.clock ?? systemClock,
    })
  }

  /**
   * Returns a loader that also knows `source` as `name`. The receiver is left
   * unchanged; both loaders share the sources they had before.
   *
   * @throws DuplicateSourceError if `name` is taken.
   */
  addSource<N extends string, S extends UnknownSource>(
    name: N,
    source: S,
  ): Loader<TSources & Record<N, S>> {
    if (this.sources.has(name)) throw new DuplicateSourceError(name)

    const sources = new Map<string, UnknownSource>(this.sources)
    sources.set(name, source)

    return new Loader<TSources & Record<N, S>>(sources, this.deps)
  }

  load<N extends SourceName<TSources>>(
    name: N,
    batchKey: BatchKeyOf<TSources[N]>,
    item: ItemOf<TSources[N]>,
  ): this {
    if (this.source(name).load(batchKey, item)) this.revisionCount++

    return this
  }

  loadMany<N extends SourceName<TSources>>(
    name: N,
    batchKey: BatchKeyOf<TSources[N]>,
    items: readonly ItemOf<TSources[N]>[],
  ): this {
    if (this.source(name).loadMany(batchKey, items)) this.revisionCount++

    return this
  }

  /**
   * @throws NotLoadedError if the item has not been loaded and run.
   * @throws The cached error if its batch failed.
   */
  get<N extends SourceName<TSources>>(
    name: N,
    batchKey: BatchKeyOf<TSources[N]>,
    item: ItemOf<TSources[N]>,
  ): ValueOf<TSources[N]> {
    return this.source(name).get(batchKey, item)
  }

  getMany<N extends SourceName<TSources>>(
    name: N,
    batchKey: BatchKeyOf<TSources[N]>,
    items: readonly ItemOf<TSources[N]>[],
  ): ValueOf<TSources[N]>[] {
    return this.source(name).getMany(batchKey, items)
  }

  peek<N extends SourceName<TSources>>(
    name: N,
    batchKey: BatchKeyOf<TSources[N]>,
    item: ItemOf<TSources[N]>,
  ): LoadResult<ValueOf<TSources[N]>> | undefined {
    return this.source(name).peek(batchKey, item)
  }

  /**
   * Warm the cache; the value is served by `get` without any fetch.
   */
  put<N extends SourceName<TSources>>(
    name: N,
    batchKey: BatchKeyOf<TSources[N]>,
    item: ItemOf<TSources[N]>,
    value: ValueOf<TSources[N]>,
  ): this {
    if (this.source(name).put(batchKey, item, value)) this.revisionCount++

    return this
  }

  hasPending(): boolean {
    for (const source of this.sources.values()) {
      if (source.hasPending()) return true
    }

    return false
  }

  sourceNames(): string[] {
    return [...this.sources.keys()]
  }

  /**
   * Increases whenever a load, put or run changed what this loader holds.
   */
  get revision(): number {
    return this.revisionCount
  }

  /**
   * Fetch everything queued in every source and wait for all of it.
   *
   * @remarks
   * Sources run concurrently. Fetch failures are cached per item and never
   * thrown here. A source whose run itself throws does not stop the others;
   * its error is rethrown once all of them have finished.
   */
  async run(): Promise<RunReport> {
    const startedAt = this.deps.clock.nowMs()
    const active = [...this.sources].filter(([, source]) => source.hasPending())

    if (active.length === 0) {
      return { sources: {}, batches: 0, failed: 0, durationMs: 0 }
    }

    const settled = await Promise.allSettled(active.map(([, source]) => source.run()))

    const sources: Record<string, SourceRunReport> = {}
    const errors: unknown[] = []
    let batches = 0
    let failed = 0

    for (const [i, outcome] of settled.entries()) {
      const name = active[i]?.[0] ?? String(i)

      if (outcome.status === "rejected") {
        errors.push(outcome.reason)
        continue
      }

      sources[name] = outcome.value
      batches += outcome.value.batches.length
      failed += outcome.value.batches.filter((b) => b.outcome === "failed").length
    }

    if (batches > 0) this.revisionCount++

    const durationMs = this.deps.clock.nowMs() - startedAt

    this.deps.logger.debug("loader run complete", {
      sources: Object.keys(sources),
      batches,
      failed,
      durationMs,
    })

    if (errors.length > 0) {
      throw new LoaderError(`${errors.length} source(s) failed to run`, {
        code: "run_failed",
        cause: new AggregateError(errors),
        isOperational: false,
      })
    }

    return { sources, batches, failed, durationMs }
  }

  private source<N extends SourceName<TSources>>(name: N): SourceAt<TSources, N> {
    const source = this.sources.get(name)

    if (!source) throw new UnknownSourceError(name, this.sourceNames())

    // The registry is heterogeneous; TSources records which source lives under `name`.
    return source as SourceAt<TSources, N>
  }
}

export function createLoader<TSources extends SourceRegistry = Record<never, never>>(
  options: LoaderOptions<TSources> = {},
): Loader<TSources> {
  return Loader.create(options)
}
