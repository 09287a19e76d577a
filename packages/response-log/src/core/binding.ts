import type { Clock, Milliseconds } from "../clock/clock"
import type { ResponseLogConfig } from "../config/schema"
import type { SinkWriteError } from "../errors/errors"
import type { Logger } from "../logger/logger"
import type { CapturedRequest, CapturedResponse } from "../ports/exchange"
import type { LogRecord } from "../ports/log-record"
import type { ResponseLogSink } from "../ports/sink"
import { buildRecord } from "./build-record"
import { createStatusFilter, type StatusFilter } from "./status-filter"

export type RequestTiming = {
  startedAt: Date
  startedMs: Milliseconds
}

/** Per-request state carried from the pre-hook to the post-hook. */
export type InFlightRequest = RequestTiming & {
  request: CapturedRequest
}

export type WriteErrorContext = {
  record: LogRecord
  sink: string
}

/**
 * Receives the error a sink raised while writing `context.record`.
 * Its own failures are logged and never reach the request.
 *
 * The InfluxDB HTTP sink rejects with a {@link SinkWriteError} whose `cause`
 * is the error from the `influx` client; other sinks pass their own error.
 */
export type WriteErrorCallback = (
  error: unknown,
  context: WriteErrorContext,
) => void | Promise<void>

export type CompletionOutcome = "written" | "filtered" | "failed"

export type ResponseLogBindingDeps = {
  config: ResponseLogConfig
  sink: ResponseLogSink
  logger: Logger
  clock: Clock
  /** Read at failure time so a callback registered after attaching applies. */
  errorCallback: () => WriteErrorCallback | undefined
}

/**
 * One attachment of the recorder: the frozen config and the sink it writes to.
 */
export class ResponseLogBinding {
  private readonly accepts: StatusFilter
  private readonly logger: Logger
  private readonly pending = new Set<Promise<void>>()
  private readonly stopping = new AbortController()

  constructor(private readonly deps: ResponseLogBindingDeps) {
    this.accepts = createStatusFilter(deps.config.statusCodeOnly)
    this.logger = deps.logger.child({ sink: deps.sink.name, measurement: deps.config.measurement })
  }

  get config(): ResponseLogConfig {
    return this.deps.config
  }

  get sink(): ResponseLogSink {
    return this.deps.sink
  }

  /** Aborted by {@link close}; ends body reads that are still running. */
  get signal(): AbortSignal {
    return this.stopping.signal
  }

  begin(): RequestTiming {
    return {
      startedAt: this.deps.clock.now(),
      startedMs: this.deps.clock.monotonicMs(),
    }
  }

  elapsed(timing: RequestTiming): Milliseconds {
    return this.deps.clock.monotonicMs() - timing.startedMs
  }

  /**
   * @param elapsedMs when the handler finished; defaults to now. Pass it when
   * the response body is read after the handler returned.
   */
  async complete(
    inFlight: InFlightRequest,
    response: CapturedResponse,
    elapsedMs: Milliseconds = this.elapsed(inFlight),
  ): Promise<CompletionOutcome> {
    const record = buildRecord({
      target: this.deps.config,
      startedAt: inFlight.startedAt,
      request: inFlight.request,
      response,
      elapsedMs,
    })

    if (!this.accepts(response.statusCode)) {
      this.logger.trace("Response log record filtered", {
        status: response.statusCode,
        path: record.tags.path,
      })
      return "filtered"
    }

    try {
      await this.deps.sink.write(record)
      return "written"
    } catch (err) {
      await this.reportFailure(err, record)
      return "failed"
    }
  }

  /**
   * Runs `task` without holding up the caller. {@link drain} and
   * {@link close} wait for it.
   */
  track(task: () => Promise<void>): void {
    const running: Promise<void> = task()
      .catch((err: unknown) => {
        this.logger.warn("Response log task failed", { err })
      })
      .finally(() => {
        this.pending.delete(running)
      })

    this.pending.add(running)
  }

  /** Resolves once every tracked task, including ones added meanwhile, has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending])
    }
  }

  /** Stops unfinished body reads, waits for their records, then closes the sink. */
  async close(): Promise<void> {
    this.stopping.abort()
    await this.drain()
    await this.deps.sink.close()
  }

  private async reportFailure(err: unknown, record: LogRecord): Promise<void> {
    this.logger.debug("Response log write failed", {
      err,
      method: record.tags.method,
      path: record.tags.path,
      status: record.fields.status_code,
    })

    const callback = this.deps.errorCallback()
    if (!callback) return

    try {
      await callback(err, { record, sink: this.deps.sink.name })
    } catch (callbackErr) {
      this.logger.warn("Response log error callback failed", { err: callbackErr })
    }
  }
}
