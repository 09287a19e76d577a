import type { Env, Hono } from "hono"
import type { BlankEnv } from "hono/types"
import { createInfluxSink } from "./adapters/influx/create-influx-sink"
import { responseLogMiddleware } from "./adapters/hono/middleware"
import type { Clock } from "./clock/clock"
import { SystemClock } from "./clock/system-clock"
import { resolveResponseLogConfig } from "./config/resolve"
import type { ResponseLogConfigInput } from "./config/schema"
import { ResponseLogBinding, type WriteErrorCallback } from "./core/binding"
import { ConfigurationError } from "./errors/errors"
import type { Logger } from "./logger/logger"
import type { RecorderDependencies, RecorderOptions, SinkFactory } from "./recorder-options"

/**
 * Records each request/response cycle of a Hono app to a time-series sink.
 *
 * @example
 * ```ts
 * const recorder = new ResponseRecorder({ logger })
 *   .onError((err) => logger.error("response log write failed", { err }))
 *
 * const app = new Hono()
 * recorder.attach(app, { influx: { database: "metrics" }, namespace: "api" })
 * app.post("/check", (c) => c.json({ status: "ok" }))
 * ```
 *
 * @remarks
 * Attach before registering routes; Hono runs middleware in registration
 * order, so a route added earlier would answer without being recorded.
 * Attaching to the same app again replaces the previous configuration.
 */
export class ResponseRecorder<E extends Env = BlankEnv> {
  private readonly logger: Logger
  private readonly clock: Clock
  private readonly createSink: SinkFactory
  private readonly bindings = new WeakMap<object, ResponseLogBinding>()
  private readonly installed = new WeakSet<object>()
  private readonly open = new Set<ResponseLogBinding>()
  private errorCallback: WriteErrorCallback | undefined

  constructor(
    deps: RecorderDependencies,
    private readonly options: RecorderOptions<E> = {},
  ) {
    this.logger = deps.logger.child({ module: "response-log" })
    this.clock = deps.clock ?? new SystemClock()
    this.createSink = deps.createSink ?? createInfluxSink
    this.errorCallback = options.onError

    if (options.app) this.attach(options.app)
  }

  /**
   * Registers the handler for failed writes, replacing any previous one.
   * Takes effect for requests already in flight.
   */
  onError(callback: WriteErrorCallback): this {
    this.errorCallback = callback
    return this
  }

  /**
   * @throws {ConfigurationError} when no configuration is available, it is
   * invalid, or `app` already has routes for specific methods
   */
  attach<AE extends Env>(app: Hono<AE>, config?: ResponseLogConfigInput): this {
    const input = config ?? this.options.config

    if (input === undefined) {
      throw new ConfigurationError(
        "Response log configuration is required to attach to an application",
        [{ path: "", message: "Required" }],
      )
    }

    if (!this.installed.has(app)) assertNoRoutes(app)

    const resolved = resolveResponseLogConfig(input)
    const binding = new ResponseLogBinding({
      config: resolved,
      sink: this.createSink(resolved),
      logger: this.logger,
      clock: this.clock,
      errorCallback: () => this.errorCallback,
    })

    const replaced = this.bindings.has(app)
    this.bindings.set(app, binding)
    this.open.add(binding)

    if (!this.installed.has(app)) {
      app.use(
        "*",
        responseLogMiddleware(() => this.bindings.get(app), {
          logger: this.logger,
          ...this.options.capture,
        }),
      )
      this.installed.add(app)
    }

    this.logger.info(replaced ? "Response logging reconfigured" : "Response logging attached", {
      measurement: resolved.measurement,
      namespace: resolved.namespace,
      sink: binding.sink.name,
    })

    return this
  }

  /** Waits until the records of responses already returned are written. */
  async flush(): Promise<void> {
    await Promise.all([...this.open].map((b) => b.drain()))
  }

  /**
   * Ends unfinished response reads, waits for pending records, then closes
   * the sinks of every attachment made by this recorder.
   */
  async close(): Promise<void> {
    const bindings = [...this.open]
    this.open.clear()

    const results = await Promise.allSettled(bindings.map((b) => b.close()))

    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.warn("Failed to close response log sink", { err: result.reason })
      }
    }
  }
}

/** Routes registered through `app.use()` and `app.all()` carry this method. */
const ANY_METHOD = "ALL"

function assertNoRoutes<AE extends Env>(app: Hono<AE>): void {
  const early = app.routes.filter((r) => r.method !== ANY_METHOD)
  if (early.length === 0) return

  throw new ConfigurationError(
    "Attach response logging before registering routes",
    early.map((r) => ({
      path: "app.routes",
      message: `${r.method} ${r.path} is registered already`,
    })),
  )
}
