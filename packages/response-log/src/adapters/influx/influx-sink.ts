import type { InfluxDB } from "influx"
import { SinkWriteError } from "../../errors/errors"
import type { LogRecord } from "../../ports/log-record"
import type { ResponseLogSink } from "../../ports/sink"
import { toPoint } from "./point"

export type InfluxWriter = Pick<InfluxDB, "writePoints">

export type InfluxSinkOptions = {
  /** Falls back to the client's default database. */
  database?: string
  /** Releases resources owned alongside the client, such as its agent. */
  onClose?: () => void
}

/** Writes records through the InfluxDB HTTP API. */
export class InfluxSink implements ResponseLogSink {
  readonly name = "influx"
  private closed = false

  constructor(
    private readonly client: InfluxWriter,
    private readonly options: InfluxSinkOptions = {},
  ) {}

  async write(record: LogRecord): Promise<void> {
    const { database } = this.options

    try {
      await this.client.writePoints([toPoint(record)], {
        precision: "ms",
        ...(database !== undefined && { database }),
      })
    } catch (err) {
      throw new SinkWriteError(this.name, record.measurement, err)
    }
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.options.onClose?.()
  }
}
