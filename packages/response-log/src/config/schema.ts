import { z } from "zod/mini"

export const DEFAULT_MEASUREMENT = "response_log"

const port = z.int().check(z.gte(1), z.lte(65_535))
const statusCode = z.int().check(z.gte(100), z.lte(599))

export const influxConnectionSchema = z.object({
  host: z._default(z.string().check(z.minLength(1)), "localhost"),
  port: z._default(port, 8086),
  username: z._default(z.string(), "root"),
  password: z._default(z.string(), "root"),
  database: z.optional(z.string()),
  ssl: z._default(z.boolean(), false),
  verifySsl: z._default(z.boolean(), false),
  retries: z._default(z.int().check(z.gte(0)), 3),
  timeoutMs: z.optional(z.int().check(z.gt(0))),
  useUdp: z._default(z.boolean(), false),
  udpPort: z._default(port, 4444),
  proxy: z.optional(z.url()),
  poolSize: z._default(z.int().check(z.gt(0)), 10),
})

export const responseLogConfigSchema = z.object({
  influx: influxConnectionSchema,
  measurement: z._default(z.string(), DEFAULT_MEASUREMENT),
  namespace: z._default(z.string(), ""),
  statusCodeOnly: z._default(z.array(statusCode), []),
})

export type InfluxConnectionConfig = z.infer<typeof influxConnectionSchema>

/**
 * Resolved, frozen configuration of one attachment.
 */
export type ResponseLogConfig = Readonly<
  Omit<z.infer<typeof responseLogConfigSchema>, "influx" | "statusCodeOnly"> & {
    influx: Readonly<InfluxConnectionConfig>
    statusCodeOnly: readonly number[]
  }
>

/**
 * InfluxDB connection settings as supplied by the caller.
 */
export interface InfluxConnectionInput {
  /** @default "localhost" */
  host?: string | undefined
  /** HTTP API port. @default 8086 */
  port?: number | undefined
  /** @default "root" */
  username?: string | undefined
  /** @default "root" */
  password?: string | undefined
  /** Required unless `useUdp` is set; the UDP listener picks its own database. */
  database?: string | undefined
  /** @default false */
  ssl?: boolean | undefined
  /** @default false */
  verifySsl?: boolean | undefined
  /**
   * Retries the client makes per write. `0` retries indefinitely.
   * @default 3
   */
  retries?: number | undefined
  /** Per-request timeout of the HTTP client. */
  timeoutMs?: number | undefined
  /** @default false */
  useUdp?: boolean | undefined
  /** @default 4444 */
  udpPort?: number | undefined
  /** HTTP or HTTPS proxy URL the HTTP client tunnels through. */
  proxy?: string | undefined
  /** Maximum open sockets to the database. @default 10 */
  poolSize?: number | undefined
}

export interface ResponseLogConfigInput {
  influx?: InfluxConnectionInput | undefined
  /** Empty means the default. @default "response_log" */
  measurement?: string | undefined
  /** @default "" */
  namespace?: string | undefined
  /** Only records with one of these statuses are written. Empty writes all. */
  statusCodeOnly?: Iterable<number> | undefined
}
