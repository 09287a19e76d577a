import dgram from "node:dgram"
import net from "node:net"
import { InfluxDB } from "influx"
import type { ResponseLogConfig } from "../../config/schema"
import { ConfigurationError } from "../../errors/errors"
import type { ResponseLogSink } from "../../ports/sink"
import { isNonEmptyString } from "../../utils/is-non-empty-string"
import { createAgent } from "./agent"
import { InfluxSink } from "./influx-sink"
import { measurementSchema } from "./point"
import { type DatagramSocket, UdpSink } from "./udp-sink"

export type InfluxSinkFactoryDeps = {
  /** @default an unref'd `dgram` socket matching the host's address family */
  createSocket?: (host: string) => DatagramSocket
}

function createUdpSocket(host: string): DatagramSocket {
  const socket = dgram.createSocket(net.isIPv6(host) ? "udp6" : "udp4")
  socket.unref()
  return socket
}

/**
 * Never takes the host out of rotation. The pool only resubmits a failed
 * write while a host is available, and with the default backoff a single
 * host is disabled on its first failure, so no retry would happen.
 */
class ImmediateRetry {
  getDelay(): number {
    return 0
  }

  next(): ImmediateRetry {
    return this
  }

  reset(): ImmediateRetry {
    return this
  }
}

/**
 * Builds the sink `config.influx` describes: UDP when `useUdp` is set,
 * otherwise the HTTP API.
 */
export function createInfluxSink(
  config: ResponseLogConfig,
  deps: InfluxSinkFactoryDeps = {},
): ResponseLogSink {
  const { influx } = config

  if (influx.useUdp) {
    return new UdpSink({
      host: influx.host,
      port: influx.udpPort,
      socket: (deps.createSocket ?? createUdpSocket)(influx.host),
    })
  }

  const database = influx.database
  if (!isNonEmptyString(database)) {
    throw new ConfigurationError("influx.database is required unless influx.useUdp is set", [
      { path: "influx.database", message: "Required unless useUdp is set" },
    ])
  }

  const agent = createAgent(influx)

  const client = new InfluxDB({
    host: influx.host,
    port: influx.port,
    protocol: influx.ssl ? "https" : "http",
    username: influx.username,
    password: influx.password,
    database,
    options: { agent, rejectUnauthorized: influx.verifySsl },
    pool: {
      maxRetries: influx.retries === 0 ? Number.POSITIVE_INFINITY : influx.retries,
      backoff: new ImmediateRetry(),
      ...(influx.timeoutMs !== undefined && { requestTimeout: influx.timeoutMs }),
    },
    schema: [measurementSchema(config.measurement, database)],
  })

  return new InfluxSink(client, { database, onClose: () => agent.destroy() })
}
