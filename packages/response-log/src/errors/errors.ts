import { type ErrorContext, ResponseLogError } from "./base-error"

export type ConfigIssue = { path: string; message: string }

export type ConfigurationErrorContext = ErrorContext & {
  issues: ConfigIssue[]
}

type SchemaIssue = {
  path: ReadonlyArray<PropertyKey>
  message: string
}

function formatPath(path: ReadonlyArray<PropertyKey>): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

export class ConfigurationError extends ResponseLogError<"configuration_error"> {
  readonly issues: ReadonlyArray<ConfigIssue>

  constructor(message: string, issues: ConfigIssue[], cause?: unknown) {
    super(message, {
      code: "configuration_error",
      context: { issues } satisfies ConfigurationErrorContext,
      ...(cause !== undefined && { cause }),
    })
    this.issues = issues
  }

  static fromIssues(issues: ReadonlyArray<SchemaIssue>, prefix?: string): ConfigurationError {
    const formatted = issues.map((i) => ({ path: formatPath(i.path), message: i.message }))
    const first = formatted[0]
    const detail = first
      ? `${first.path ? `${first.path}: ` : ""}${first.message}`
      : "Invalid configuration"

    return new ConfigurationError(prefix ? `${prefix}: ${detail}` : detail, formatted)
  }
}

export class SinkWriteError extends ResponseLogError<"sink_write_error"> {
  constructor(sink: string, measurement: string, cause: unknown) {
    super(`Failed to write record to ${sink}`, {
      code: "sink_write_error",
      context: { sink, measurement },
      cause,
      isRetryable: true,
    })
  }
}
