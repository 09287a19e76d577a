import type { Logger, ResponseLogConfigInput, ResponseRecorder } from "@response-log/core"
import { Hono } from "hono"

export type CheckAppDeps = {
  recorder: ResponseRecorder
  logger: Logger
}

/**
 * A single `/check` route answering GET and POST with `{"status":"ok"}`,
 * logged through `recorder`.
 */
export function createCheckApp(deps: CheckAppDeps, config: ResponseLogConfigInput): Hono {
  const app = new Hono()

  deps.recorder
    .onError((err, { record, sink }) => {
      deps.logger.error("Response log write failed", {
        err,
        sink,
        method: record.tags.method,
        path: record.tags.path,
      })
    })
    .attach(app, config)

  app.on(["GET", "POST"], "/check", (c) => c.json({ status: "ok" }))

  return app
}
