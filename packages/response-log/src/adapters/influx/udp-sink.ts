import { SinkWriteError } from "../../errors/errors"
import type { LogRecord } from "../../ports/log-record"
import type { ResponseLogSink } from "../../ports/sink"
import { toLine } from "./line-protocol"

/** The part of `dgram.Socket` the sink uses. */
export interface DatagramSocket {
  send(
    msg: string,
    port: number,
    address: string,
    callback: (error: Error | null) => void,
  ): void
  close(callback?: () => void): unknown
}

export type UdpSinkOptions = {
  host: string
  port: number
  socket: DatagramSocket
}

/**
 * Sends one line-protocol datagram per record to an InfluxDB UDP listener.
 * The listener decides the database.
 */
export class UdpSink implements ResponseLogSink {
  readonly name = "udp"
  private closed = false

  constructor(private readonly options: UdpSinkOptions) {}

  async write(record: LogRecord): Promise<void> {
    const { socket, port, host } = this.options
    const line = toLine(record)

    try {
      await new Promise<void>((resolve, reject) => {
        socket.send(line, port, host, (error) => (error ? reject(error) : resolve()))
      })
    } catch (err) {
      throw new SinkWriteError(this.name, record.measurement, err)
    }
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    await new Promise<void>((resolve) => {
      this.options.socket.close(() => resolve())
    })
  }
}
