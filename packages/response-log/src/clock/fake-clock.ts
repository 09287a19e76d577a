import type { Clock, Milliseconds } from "./clock"

/** Clock that only moves when told to. Wall and monotonic time advance together. */
export class FakeClock implements Clock {
  private wall: Milliseconds
  private mono: Milliseconds = 0

  constructor(start: Milliseconds = 0) {
    this.wall = start
  }

  now(): Date {
    return new Date(this.wall)
  }

  monotonicMs(): Milliseconds {
    return this.mono
  }

  advance(ms: Milliseconds): void {
    this.wall += ms
    this.mono += ms
  }

  /** Moves wall time only; monotonic time never goes backwards. */
  set(ms: Milliseconds): void {
    this.wall = ms
  }
}
