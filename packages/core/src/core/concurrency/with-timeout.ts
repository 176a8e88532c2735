import { FetchTimeoutError } from "../errors/errors"

/**
 * Run `task` with an abort signal that fires after `timeoutMs`.
 *
 * On expiry the returned promise rejects with `FetchTimeoutError`; the task is
 * only signalled, so a late result is discarded. Without `timeoutMs` the task
 * runs unbounded.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs?: number,
): Promise<T> {
  const controller = new AbortController()

  if (timeoutMs === undefined) return await task(controller.signal)

  let timer: NodeJS.Timeout | undefined

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new FetchTimeoutError(timeoutMs)

      controller.abort(error)
      reject(error)
    }, timeoutMs)

    timer.unref?.()
  })

  try {
    return await Promise.race([task(controller.signal), expired])
  } finally {
    clearTimeout(timer)
  }
}
