import { serve } from "@hono/node-server"
import { createPinoLogger, loadResponseLogConfig, ResponseRecorder } from "@response-log/core"
import { loadAppConfig } from "../app/config"
import { createCheckApp } from "../app/create-check-app"

export async function run(env: Record<string, string | undefined> = process.env): Promise<void> {
  const config = await loadAppConfig(env)
  const logger = createPinoLogger(
    {},
    { level: config.logging.level, prettify: config.logging.prettify },
    { service: config.logging.serviceName },
  )

  const responseLog = await loadResponseLogConfig({ env, logger })
  const recorder = new ResponseRecorder({ logger })
  const app = createCheckApp({ recorder, logger }, responseLog)

  const server = serve(
    { fetch: app.fetch, hostname: config.server.host, port: config.server.port },
    (info) => {
      logger.info("Server started", { host: info.address, port: info.port })
    },
  )

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info("Shutting down", { signal })
    server.close(() => {
      recorder.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error("Shutdown failed", { err })
          process.exit(1)
        },
      )
    })
  }

  process.once("SIGINT", shutdown)
  process.once("SIGTERM", shutdown)
}
