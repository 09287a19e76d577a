import { ConfigurationError } from "../errors/errors"
import { deepFreeze } from "../utils/deep-freeze"
import { isNonEmptyString } from "../utils/is-non-empty-string"
import {
  DEFAULT_MEASUREMENT,
  type ResponseLogConfig,
  type ResponseLogConfigInput,
  responseLogConfigSchema,
} from "./schema"

/**
 * Applies defaults, validates and freezes a configuration.
 *
 * @throws {ConfigurationError} when a value is missing or out of range
 */
export function resolveResponseLogConfig(input: ResponseLogConfigInput): ResponseLogConfig {
  const result = responseLogConfigSchema.safeParse({
    influx: input.influx ?? {},
    measurement: input.measurement,
    namespace: input.namespace,
    statusCodeOnly:
      input.statusCodeOnly === undefined ? undefined : [...input.statusCodeOnly],
  })

  if (!result.success) {
    throw ConfigurationError.fromIssues(result.error.issues, "Invalid response log configuration")
  }

  const { influx, measurement, namespace, statusCodeOnly } = result.data

  if (!influx.useUdp && !isNonEmptyString(influx.database)) {
    throw new ConfigurationError(
      "Invalid response log configuration: influx.database is required unless influx.useUdp is set",
      [{ path: "influx.database", message: "Required unless useUdp is set" }],
    )
  }

  return deepFreeze({
    influx,
    measurement: isNonEmptyString(measurement) ? measurement : DEFAULT_MEASUREMENT,
    namespace,
    statusCodeOnly: [...new Set(statusCodeOnly)],
  })
}
