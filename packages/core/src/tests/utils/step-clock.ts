import type { Clock } from "../../ports/clock"

/**
 * Clock advancing by a fixed step on every read, so each measured duration
 * is a known multiple of `stepMs`.
 */
export class StepClock implements Clock {
  private current: number

  constructor(
    start = 0,
    private readonly stepMs = 5,
  ) {
    this.current = start
  }

  nowMs(): number {
    const now = this.current
    this.current += this.stepMs
    return now
  }
}
