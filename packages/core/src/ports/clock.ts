export type Milliseconds = number

export interface Clock {
  /** Monotonic milliseconds, for measuring durations only. */
  nowMs(): Milliseconds
}
