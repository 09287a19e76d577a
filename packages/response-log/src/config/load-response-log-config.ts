import { NullLogger } from "../logger/null-logger"
import type { Logger } from "../logger/logger"
import {
  RESPONSE_LOG_ENV_PREFIX,
  type ResponseLogEnv,
  mapEnvToConfig,
  responseLogEnvSchema,
} from "./env-schema"
import { loadConfig } from "./load"
import { resolveResponseLogConfig } from "./resolve"
import type { ResponseLogConfig } from "./schema"
import { DotenvSource } from "./sources/dotenv-source"
import { EnvSource } from "./sources/env-source"

export type LoadResponseLogConfigOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>
  /** Directory the dotenv file is resolved against. @default process.cwd() */
  cwd?: string
  /** Optional dotenv file read before the environment. @default ".env" */
  dotenvFile?: string
  /** @default "RESPONSE_LOG_" */
  prefix?: string
  logger?: Logger
}

/**
 * Builds a configuration from `RESPONSE_LOG_*` keys of a dotenv file and the
 * environment. Environment values override the file.
 *
 * @throws {ConfigurationError} on invalid or missing values
 */
export async function loadResponseLogConfig(
  options: LoadResponseLogConfigOptions = {},
): Promise<ResponseLogConfig> {
  const prefix = options.prefix ?? RESPONSE_LOG_ENV_PREFIX
  const logger = (options.logger ?? new NullLogger()).child({ module: "response-log.config" })

  const config = await loadConfig<ResponseLogEnv>({
    schema: responseLogEnvSchema,
    sources: [
      new DotenvSource({
        file: options.dotenvFile ?? ".env",
        required: false,
        prefix,
        ...(options.cwd !== undefined && { cwd: options.cwd }),
      }),
      new EnvSource({ prefix, ...(options.env !== undefined && { env: options.env }) }),
    ],
  })

  for (const key of config.unknownKeys()) {
    logger.warn("Unknown response log setting ignored", { key: `${prefix}${key}` })
  }

  logger.debug("Response log settings loaded", {
    sources: config.sourcesUsed(),
    database: config.explain("INFLUXDB_DATABASE"),
    measurement: config.explain("INFLUXDB_MEASUREMENT"),
  })

  return resolveResponseLogConfig(mapEnvToConfig(config.value))
}
