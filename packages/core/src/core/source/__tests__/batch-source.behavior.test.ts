import type { Logger } from "@batchweave/logger"
import { mock } from "vitest-mock-extended"
import type { BatchFetchFn } from "../../../ports/batch-fetch"
import type { ItemKey } from "../../../ports/item-key"
import { StepClock } from "../../../tests/utils/step-clock"
import { countingFetch } from "../../../tests/utils/counting-fetch"
import {
  BatchFetchError,
  FetchTimeoutError,
  InvalidConfigError,
  InvalidItemError,
  MissingItemError,
  NotLoadedError,
} from "../../errors/errors"
import { BatchSource } from "../batch-source"

type Post = { id: number; authorId: number }

describe("BatchSource behavior", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  describe("options", () => {
    const fetch: BatchFetchFn<string, number, number> = async () => new Map()

    it.each([0, -1, 1.5, Number.NaN])("rejects maxConcurrency %s", (maxConcurrency) => {
      expect(() => new BatchSource({ fetch, maxConcurrency })).toThrow(InvalidConfigError)
    })

    it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])("rejects timeoutMs %s", (timeoutMs) => {
      expect(() => new BatchSource({ fetch, timeoutMs })).toThrow(InvalidConfigError)
    })

    it("names the offending option", () => {
      expect(() => new BatchSource({ fetch, maxConcurrency: 0 })).toThrow(
        "maxConcurrency must be a positive integer, got 0",
      )
    })

    it("accepts an unbounded maxConcurrency", () => {
      expect(
        () => new BatchSource({ fetch, maxConcurrency: Number.POSITIVE_INFINITY, timeoutMs: 50 }),
      ).not.toThrow()
    })
  })

  describe("batch keys", () => {
    it("groups structurally equal object batch keys together", async () => {
      const batchKeys: unknown[] = []
      const source = new BatchSource<{ type: string; status: string }, number, string>({
        fetch: async (batchKey, ids) => {
          batchKeys.push(batchKey)
          return new Map(ids.map((id) => [id, `${batchKey.status}:${id}`]))
        },
      })

      source.load({ type: "Post", status: "draft" }, 1)
      source.load({ status: "draft", type: "Post" }, 2)
      await source.run()

      expect(batchKeys).toEqual([{ type: "Post", status: "draft" }])
      expect(source.get({ status: "draft", type: "Post" }, 1)).toBe("draft:1")
    })

    it("uses a custom batchKey normalizer", async () => {
      const { fetch, calls } = countingFetch(new Map([[1, "Ben"]]))
      const source = new BatchSource({ fetch, batchKey: (tag: string) => tag.toLowerCase() })

      source.load("User", 1)
      source.load("user", 1)
      await source.run()

      expect(calls).toHaveLength(1)
      expect(source.get("USER", 1)).toBe("Ben")
    })
  })

  describe("item keys", () => {
    it("derives keys from rich items with itemKey", async () => {
      const seen: Post[][] = []
      const source = new BatchSource<string, Post, string>({
        itemKey: (post) => post.authorId,
        fetch: async (_tag, posts) => {
          seen.push([...posts])
          return new Map(posts.map((p) => [p.authorId, `author-${p.authorId}`]))
        },
      })

      source.load("author", { id: 1, authorId: 7 })
      source.load("author", { id: 2, authorId: 7 })
      source.load("author", { id: 3, authorId: 8 })
      await source.run()

      expect(seen).toEqual([
        [
          { id: 1, authorId: 7 },
          { id: 3, authorId: 8 },
        ],
      ])
      expect(source.get("author", { id: 2, authorId: 7 })).toBe("author-7")
    })

    it("rejects non-primitive items without itemKey", () => {
      const source = new BatchSource<string, Post, string>({
        name: "posts",
        fetch: async () => new Map<ItemKey, string>(),
      })

      expect(() => source.load("Post", { id: 1, authorId: 1 })).toThrow(InvalidItemError)
    })
  })

  describe("missing items", () => {
    it("fails missing items by default", async () => {
      const { fetch } = countingFetch(new Map([[1, "Ben"]]))
      const source = new BatchSource({ fetch, name: "users" })

      source.loadMany("User", [1, 2])
      await source.run()

      expect(source.get("User", 1)).toBe("Ben")
      expect(() => source.get("User", 2)).toThrow(MissingItemError)

      const result = source.peek("User", 2)
      expect(result?.kind === "failed" && result.error.context).toEqual({
        source: "users",
        batchKey: '"User"',
        itemKey: "2",
      })
    })

    it("resolves missing items to the configured value", async () => {
      const { fetch } = countingFetch(new Map([[1, "Ben"]]))
      const source = new BatchSource<string, number, string | null>({
        fetch,
        missing: { kind: "resolve", value: null },
      })

      source.loadMany("User", [1, 2])
      await source.run()

      expect(source.getMany("User", [1, 2])).toEqual(["Ben", null])
    })

    it("ignores keys that were not requested", async () => {
      const source = new BatchSource<string, number, string>({
        fetch: async () =>
          new Map([
            [1, "Ben"],
            [99, "unrequested"],
          ]),
      })

      source.load("User", 1)
      await source.run()

      expect(source.peek("User", 99)).toBeUndefined()
    })
  })

  describe("failures", () => {
    it("caches one BatchFetchError for every item of the batch", async () => {
      const cause = new Error("connection refused")
      const source = new BatchSource<string, number, string>({
        name: "users",
        fetch: async () => {
          throw cause
        },
      })

      source.loadMany("User", [1, 2])
      await source.run()

      const first = source.peek("User", 1)
      const second = source.peek("User", 2)

      expect(first?.kind).toBe("failed")
      expect(first).toEqual(second)

      try {
        source.get("User", 1)
        expect.unreachable("get should rethrow the cached failure")
      } catch (err) {
        expect(err).toBeInstanceOf(BatchFetchError)
        expect(err).toMatchObject({
          code: "batch_fetch_failed",
          message: 'Fetching batch "User" failed: connection refused',
          context: { source: "users", batchKey: '"User"', items: 2 },
          cause,
        })
      }
    })

    it("captures synchronous throws from the fetch", async () => {
      const fetch: BatchFetchFn<string, number, string> = () => {
        throw new Error("bad input")
      }
      const source = new BatchSource({ fetch })

      source.load("User", 1)
      const report = await source.run()

      expect(report.batches[0]?.outcome).toBe("failed")
      expect(() => source.get("User", 1)).toThrow("bad input")
    })

    it("fails the batch when the fetch times out", async () => {
      vi.useFakeTimers()

      let signal: AbortSignal | undefined
      const source = new BatchSource<string, number, string>({
        timeoutMs: 100,
        fetch: (_tag, _ids, ctx) => {
          signal = ctx.signal
          return new Promise(() => {})
        },
      })

      source.load("User", 1)
      const running = source.run()
      await vi.advanceTimersByTimeAsync(100)
      const report = await running

      expect(report.batches[0]?.outcome).toBe("failed")
      expect(signal?.aborted).toBe(true)

      const result = source.peek("User", 1)
      expect(result?.kind === "failed" && result.error.cause).toBeInstanceOf(FetchTimeoutError)
    })
  })

  describe("concurrency", () => {
    it("runs batches concurrently up to maxConcurrency", async () => {
      let active = 0
      let peak = 0

      const source = new BatchSource<string, number, number>({
        maxConcurrency: 2,
        fetch: async (_tag, ids) => {
          active++
          peak = Math.max(peak, active)
          await new Promise((r) => setTimeout(r, 1))
          active--
          return new Map(ids.map((id) => [id, id]))
        },
      })

      for (const tag of ["A", "B", "C", "D"]) source.load(tag, 1)
      const report = await source.run()

      expect(report.batches).toHaveLength(4)
      expect(peak).toBe(2)
    })

    it("queues loads made during a run for the next run", async () => {
      let release: () => void = () => {}
      const gate = new Promise<void>((r) => {
        release = r
      })
      const requested: number[][] = []

      const source = new BatchSource<string, number, number>({
        fetch: async (_tag, ids) => {
          requested.push([...ids])
          await gate
          return new Map(ids.map((id) => [id, id * 2]))
        },
      })

      source.load("N", 1)
      const first = source.run()

      source.load("N", 2)
      expect(source.hasPending()).toBe(true)

      release()
      await first
      await source.run()

      expect(requested).toEqual([[1], [2]])
      expect(source.getMany("N", [1, 2])).toEqual([2, 4])
    })

    it("does not refetch an item queued again while its fetch was in flight", async () => {
      let release: () => void = () => {}
      const gate = new Promise<void>((r) => {
        release = r
      })
      const requested: number[][] = []

      const source = new BatchSource<string, number, number>({
        fetch: async (_tag, ids) => {
          requested.push([...ids])
          await gate
          return new Map(ids.map((id) => [id, id * 2]))
        },
      })

      source.load("N", 1)
      const first = source.run()

      expect(source.load("N", 1)).toBe(true)

      release()
      await first
      const second = await source.run()

      expect(requested).toEqual([[1]])
      expect(second.batches).toEqual([])
      expect(source.hasPending()).toBe(false)
      expect(source.get("N", 1)).toBe(2)
    })

    it("keeps a value put after the item was queued", async () => {
      const { fetch, calls } = countingFetch(new Map([[1, "fetched"]]))
      const source = new BatchSource({ fetch })

      source.load("User", 1)
      source.put("User", 1, "put")
      await source.run()

      expect(calls).toHaveLength(0)
      expect(source.get("User", 1)).toBe("put")
    })
  })

  describe("embedded values", () => {
    type Owner = { id: number; posts?: { loaded: true; value: string[] } }

    const makeSource = (calls: number[][]) =>
      new BatchSource<string, Owner, string[]>({
        itemKey: (owner) => owner.id,
        resolveEmbedded: (_assoc, owner) =>
          owner.posts?.loaded === true
            ? { kind: "resolved", value: owner.posts.value }
            : { kind: "unresolved" },
        fetch: async (_assoc, owners) => {
          calls.push(owners.map((o) => o.id))
          return new Map(owners.map((o) => [o.id, [`fetched-${o.id}`]]))
        },
      })

    it("seeds the cache from an explicitly loaded value", async () => {
      const calls: number[][] = []
      const source = makeSource(calls)

      expect(source.load("posts", { id: 1, posts: { loaded: true, value: ["a", "b"] } })).toBe(
        true,
      )
      expect(source.hasPending()).toBe(false)

      await source.run()

      expect(calls).toEqual([])
      expect(source.get("posts", { id: 1 })).toEqual(["a", "b"])
    })

    it("drops the queued entry when a later load carries the value", async () => {
      const calls: number[][] = []
      const source = makeSource(calls)

      source.load("posts", { id: 1 })
      expect(source.hasPending()).toBe(true)

      source.load("posts", { id: 1, posts: { loaded: true, value: ["a"] } })
      expect(source.hasPending()).toBe(false)

      await source.run()

      expect(calls).toEqual([])
      expect(source.get("posts", { id: 1 })).toEqual(["a"])
    })

    it("queues items without a loaded value", async () => {
      const calls: number[][] = []
      const source = makeSource(calls)

      source.load("posts", { id: 2 })
      await source.run()

      expect(calls).toEqual([[2]])
      expect(source.get("posts", { id: 2 })).toEqual(["fetched-2"])
    })
  })

  describe("not loaded", () => {
    it("names the batch and item in the error", () => {
      const { fetch } = countingFetch(new Map<number, string>())
      const source = new BatchSource({ fetch, name: "users" })

      expect(() => source.get("User", 5)).toThrow(NotLoadedError)
      expect(() => source.get("User", 5)).toThrow('Item 5 in batch "User" was never loaded')
    })
  })

  describe("logging and reports", () => {
    it("reports each batch with its duration", async () => {
      const { fetch } = countingFetch(new Map([[1, "Ben"]]))
      const source = new BatchSource({ fetch }, { clock: new StepClock(0, 5) })

      source.load("User", 1)
      const report = await source.run()

      expect(report.batches).toEqual([
        { batchKey: '"User"', items: 1, outcome: "loaded", durationMs: 5 },
      ])
    })

    it("logs loaded batches at debug and failures at warn", async () => {
      const logger = mock<Logger>()
      const child = mock<Logger>()
      const batchLogger = mock<Logger>()
      logger.child.mockReturnValue(child)
      child.child.mockReturnValue(batchLogger)

      const error = new Error("down")
      const source = new BatchSource<string, number, string>(
        {
          name: "users",
          fetch: async (tag) => {
            if (tag === "Broken") throw error
            return new Map([[1, "Ben"]])
          },
        },
        { logger, clock: new StepClock(0, 5) },
      )

      source.load("User", 1)
      source.load("Broken", 1)
      await source.run()

      expect(logger.child).toHaveBeenCalledWith({ source: "users" })
      expect(child.child).toHaveBeenCalledWith({ batchKey: '"User"' })
      expect(batchLogger.debug).toHaveBeenCalledWith("batch loaded", {
        items: 1,
        durationMs: expect.any(Number),
        outcome: "loaded",
      })
      expect(batchLogger.warn).toHaveBeenCalledWith("batch failed", {
        items: 1,
        durationMs: expect.any(Number),
        outcome: "failed",
        err: error,
      })
    })
  })
})
