import http from "node:http"
import https from "node:https"
import { HttpProxyAgent } from "http-proxy-agent"
import { HttpsProxyAgent } from "https-proxy-agent"
import type { InfluxConnectionConfig } from "../../config/schema"

/**
 * Keep-alive agent bounded to `poolSize` sockets, tunnelling through
 * `proxy` when one is configured.
 */
export function createAgent(influx: Readonly<InfluxConnectionConfig>): http.Agent {
  const pool = { keepAlive: true, maxSockets: influx.poolSize }

  if (influx.proxy !== undefined) {
    return influx.ssl
      ? new HttpsProxyAgent(influx.proxy, pool)
      : new HttpProxyAgent(influx.proxy, pool)
  }

  return influx.ssl
    ? new https.Agent({ ...pool, rejectUnauthorized: influx.verifySsl })
    : new http.Agent(pool)
}
