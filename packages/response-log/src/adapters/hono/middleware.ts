import type { MiddlewareHandler } from "hono"
import type { InFlightRequest, ResponseLogBinding } from "../../core/binding"
import type { Logger } from "../../logger/logger"
import { type CaptureOptions, captureRequest, captureResponse } from "./capture"
import type { ResponseLogVariables } from "./context"

export type ResponseLogMiddlewareOptions = CaptureOptions & {
  logger: Logger
}

/**
 * Records every request that passes through it.
 *
 * @remarks
 * - The binding is looked up per request, so re-attaching takes effect
 *   without installing a second middleware.
 * - Handler errors turned into a response by `app.onError` are recorded
 *   with that response. If `next()` itself rejects, the request is not
 *   recorded and the error propagates.
 * - The response body is read and the record written after the middleware
 *   returns, so streamed responses reach the client unhindered. Use
 *   `ResponseRecorder.flush()` to wait for pending records.
 * - Capture or sink problems are logged and never change the response.
 */
export function responseLogMiddleware(
  currentBinding: () => ResponseLogBinding | undefined,
  options: ResponseLogMiddlewareOptions,
): MiddlewareHandler<{ Variables: ResponseLogVariables }> {
  const { logger, ...capture } = options

  return async (c, next) => {
    const binding = currentBinding()

    if (!binding) {
      await next()
      return
    }

    let inFlight: InFlightRequest | undefined

    try {
      const timing = binding.begin()
      inFlight = {
        ...timing,
        request: await captureRequest(c, { ...capture, logger, signal: binding.signal }),
      }
      c.set("responseLog", inFlight)
    } catch (err) {
      logger.warn("Failed to capture request for response log", {
        err,
        method: c.req.method,
        path: c.req.path,
      })
    }

    await next()

    if (!inFlight) return

    const recorded = inFlight
    const res = c.res
    const elapsedMs = binding.elapsed(recorded)

    // captureResponse clones `res` synchronously, before this middleware returns.
    binding.track(async () => {
      try {
        const response = await captureResponse(res, {
          ...capture,
          logger,
          signal: binding.signal,
        })
        await binding.complete(recorded, response, elapsedMs)
      } catch (err) {
        logger.warn("Failed to record response", {
          err,
          method: recorded.request.method,
          path: recorded.request.path,
          status: res.status,
        })
      }
    })
  }
}
