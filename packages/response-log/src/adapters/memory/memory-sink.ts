import type { LogRecord } from "../../ports/log-record"
import type { ResponseLogSink } from "../../ports/sink"

/**
 * Keeps records in memory. For tests and local development.
 */
export class MemorySink implements ResponseLogSink {
  readonly name = "memory"
  private readonly written: LogRecord[] = []
  private failure: Error | undefined
  private closedFlag = false

  get records(): readonly LogRecord[] {
    return this.written
  }

  get closed(): boolean {
    return this.closedFlag
  }

  /** Makes every following write reject with `error` until {@link recover}. */
  failWith(error: Error): void {
    this.failure = error
  }

  recover(): void {
    this.failure = undefined
  }

  clear(): void {
    this.written.length = 0
  }

  async write(record: LogRecord): Promise<void> {
    if (this.failure) throw this.failure
    this.written.push(record)
  }

  async close(): Promise<void> {
    this.closedFlag = true
  }
}
