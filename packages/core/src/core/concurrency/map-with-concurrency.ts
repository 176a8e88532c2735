/**
 * Run `fn` over `items` with at most `limit` calls in flight, preserving input
 * order in the output. Resolves once every call has settled.
 *
 * @remarks
 * Rejects with the first error, but only after the remaining in-flight calls
 * finish; callers wanting isolation should make `fn` non-throwing.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!(limit >= 1)) {
    throw new RangeError(`Concurrency limit must be at least 1, got ${limit}`)
  }

  const results: R[] = []
  const queue = items.entries()

  // Workers share one iterator, so each item is taken exactly once.
  const worker = async (): Promise<void> => {
    for (const [index, item] of queue) {
      results[index] = await fn(item, index)
    }
  }

  const workers = Array.from({ length: Math.min(limit, items.length) }, worker)
  const settled = await Promise.allSettled(workers)

  for (const outcome of settled) {
    if (outcome.status === "rejected") throw outcome.reason
  }

  return results
}
