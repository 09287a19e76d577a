import type { Clock, Milliseconds } from "./clock"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  monotonicMs(): Milliseconds {
    return performance.now()
  }
}
