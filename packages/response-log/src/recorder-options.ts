import type { Env, Hono } from "hono"
import type { BlankEnv } from "hono/types"
import type { Clock } from "./clock/clock"
import type { ResponseLogConfig, ResponseLogConfigInput } from "./config/schema"
import type { WriteErrorCallback } from "./core/binding"
import type { Logger } from "./logger/logger"
import type { ResponseLogSink } from "./ports/sink"

export type SinkFactory = (config: ResponseLogConfig) => ResponseLogSink

export interface RecorderDependencies {
  logger: Logger

  /** @default new SystemClock() */
  clock?: Clock

  /**
   * Builds the sink for each attachment.
   *
   * @default createInfluxSink
   */
  createSink?: SinkFactory
}

export interface RecorderOptions<E extends Env = BlankEnv> {
  /** Attach immediately. Requires `config`. */
  app?: Hono<E>

  /** Used by `attach()` calls that pass no configuration. */
  config?: ResponseLogConfigInput

  onError?: WriteErrorCallback

  capture?: {
    /** @default 0 */
    trustedProxies?: number
    /** Request and response bodies above this size are recorded as "". @default 1 MiB */
    maxBodyBytes?: number
  }
}
