import { z } from "zod/mini"
import { DEFAULT_MEASUREMENT, type ResponseLogConfigInput } from "./schema"

export const RESPONSE_LOG_ENV_PREFIX = "RESPONSE_LOG_"

/** Keys are read with {@link RESPONSE_LOG_ENV_PREFIX} removed. */
export const responseLogEnvSchema = z.object({
  INFLUXDB_HOST: z._default(z.string(), "localhost"),
  INFLUXDB_PORT: z._default(z.coerce.number(), 8086),
  INFLUXDB_USER: z._default(z.string(), "root"),
  INFLUXDB_PASSWORD: z._default(z.string(), "root"),
  INFLUXDB_DATABASE: z.optional(z.string()),
  INFLUXDB_SSL: z._default(z.stringbool(), false),
  INFLUXDB_VERIFY_SSL: z._default(z.stringbool(), false),
  INFLUXDB_RETRIES: z._default(z.coerce.number(), 3),
  INFLUXDB_TIMEOUT_MS: z.optional(z.coerce.number()),
  /** Seconds. Older name; `INFLUXDB_TIMEOUT_MS` wins when both are set. */
  INFLUXDB_TIMEOUT: z.optional(z.coerce.number()),
  INFLUXDB_USE_UDP: z._default(z.stringbool(), false),
  INFLUXDB_UDP_PORT: z._default(z.coerce.number(), 4444),
  INFLUXDB_PROXY: z.optional(z.string()),
  /** Older name; `INFLUXDB_PROXY` wins when both are set. */
  INFLUXDB_PROXIES: z.optional(z.string()),
  INFLUXDB_POOL_SIZE: z._default(z.coerce.number(), 10),
  INFLUXDB_MEASUREMENT: z._default(z.string(), DEFAULT_MEASUREMENT),
  INFLUXDB_NAMESPACE: z._default(z.string(), ""),
  /** Comma-separated, e.g. "200,201". */
  STATUS_CODE_ONLY: z._default(z.string(), ""),
})

export type ResponseLogEnv = z.infer<typeof responseLogEnvSchema>

export function parseStatusCodeList(raw: string): number[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map(Number)
}

function secondsToMs(seconds: number | undefined): number | undefined {
  return seconds === undefined ? undefined : Math.round(seconds * 1000)
}

export function mapEnvToConfig(env: ResponseLogEnv): ResponseLogConfigInput {
  return {
    influx: {
      host: env.INFLUXDB_HOST,
      port: env.INFLUXDB_PORT,
      username: env.INFLUXDB_USER,
      password: env.INFLUXDB_PASSWORD,
      database: env.INFLUXDB_DATABASE,
      ssl: env.INFLUXDB_SSL,
      verifySsl: env.INFLUXDB_VERIFY_SSL,
      retries: env.INFLUXDB_RETRIES,
      timeoutMs: env.INFLUXDB_TIMEOUT_MS ?? secondsToMs(env.INFLUXDB_TIMEOUT),
      useUdp: env.INFLUXDB_USE_UDP,
      udpPort: env.INFLUXDB_UDP_PORT,
      proxy: env.INFLUXDB_PROXY ?? env.INFLUXDB_PROXIES,
      poolSize: env.INFLUXDB_POOL_SIZE,
    },
    measurement: env.INFLUXDB_MEASUREMENT,
    namespace: env.INFLUXDB_NAMESPACE,
    statusCodeOnly: parseStatusCodeList(env.STATUS_CODE_ONLY),
  }
}
