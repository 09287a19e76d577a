import { SinkWriteError } from "../../../errors/errors"
import { logRecord } from "../../../tests/fixtures"
import { toLine } from "../line-protocol"
import { type DatagramSocket, UdpSink } from "../udp-sink"

type Sent = { msg: string; port: number; address: string }

function fakeSocket(sendError: Error | null = null) {
  const sent: Sent[] = []
  let closeCalls = 0

  const socket: DatagramSocket = {
    send(msg, port, address, callback) {
      sent.push({ msg, port, address })
      queueMicrotask(() => callback(sendError))
    },
    close(callback) {
      closeCalls += 1
      callback?.()
    },
  }

  return { socket, sent, closeCalls: () => closeCalls }
}

describe("UdpSink", () => {
  it("sends the record as one line-protocol datagram", async () => {
    const { socket, sent } = fakeSocket()
    const sink = new UdpSink({ host: "influx.local", port: 4444, socket })
    const record = logRecord()

    await sink.write(record)

    expect(sent).toEqual([{ msg: toLine(record), port: 4444, address: "influx.local" }])
  })

  it("wraps send errors in SinkWriteError", async () => {
    const cause = new Error("EMSGSIZE")
    const { socket } = fakeSocket(cause)
    const sink = new UdpSink({ host: "influx.local", port: 4444, socket })

    const err = await sink.write(logRecord()).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(SinkWriteError)
    expect(err).toMatchObject({ cause, context: { sink: "udp", measurement: "response_log" } })
  })

  it("closes the socket once", async () => {
    const { socket, closeCalls } = fakeSocket()
    const sink = new UdpSink({ host: "influx.local", port: 4444, socket })

    await sink.close()
    await sink.close()

    expect(closeCalls()).toBe(1)
  })
})
