import { EnvSource, loadConfig, logLevelNames } from "@response-log/core"
import { z } from "zod/mini"

export const CHECK_APP_ENV_PREFIX = "CHECK_APP_"

export const appEnvSchema = z.object({
  HOST: z._default(z.string(), "0.0.0.0"),
  PORT: z._default(z.coerce.number().check(z.gte(0), z.lte(65535)), 5000),
  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),
  SERVICE_NAME: z._default(z.string(), "check-app"),
})

export type AppEnv = z.infer<typeof appEnvSchema>

export type AppConfig = {
  server: { host: string; port: number }
  logging: { level: AppEnv["LOG_LEVEL"]; prettify: boolean; serviceName: string }
}

export function mapEnvToAppConfig(env: AppEnv): AppConfig {
  return {
    server: { host: env.HOST, port: env.PORT },
    logging: { level: env.LOG_LEVEL, prettify: env.LOG_PRETTY, serviceName: env.SERVICE_NAME },
  }
}

export async function loadAppConfig(
  env: Record<string, string | undefined> = process.env,
): Promise<AppConfig> {
  const config = await loadConfig<AppEnv>({
    schema: appEnvSchema,
    sources: [new EnvSource({ prefix: CHECK_APP_ENV_PREFIX, env })],
  })

  return mapEnvToAppConfig(config.value)
}
