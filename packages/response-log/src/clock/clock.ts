export type Milliseconds = number

export type Clock = {
  /** Wall-clock time, used for record timestamps. */
  now(): Date

  /**
   * Monotonic milliseconds from an arbitrary origin.
   *
   * @remarks
   * Only meaningful as a difference between two readings.
   */
  monotonicMs(): Milliseconds
}
