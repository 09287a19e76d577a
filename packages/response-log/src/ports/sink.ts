import type { LogRecord } from "./log-record"

/**
 * Persistence target for records.
 *
 * `write` rejects when the record could not be stored; the recorder never
 * lets that rejection reach the request.
 */
export interface ResponseLogSink {
  /** Short identifier used in logs and error context, e.g. "influx", "udp". */
  readonly name: string

  write(record: LogRecord): Promise<void>

  /** Releases sockets or agents held by the sink. Safe to call twice. */
  close(): Promise<void>
}
