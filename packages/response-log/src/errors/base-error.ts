export type ErrorCode = Lowercase<string>

export type ErrorContext = Readonly<Record<string, unknown>>

export type ResponseLogErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Serialized error shape for logging and transport. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

export class ResponseLogError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  /** `true` if repeating the operation might succeed. */
  readonly isRetryable: boolean
  /**
   * `true` for expected runtime failures (bad config, unreachable database),
   * `false` for invariant violations.
   */
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: ResponseLogErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean
}>

/**
 * Serializes any thrown value to a {@link SerializedError}.
 *
 * Plain `Error`s get code "unknown"; non-errors are wrapped with the value
 * in `context`.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const known = err instanceof ResponseLogError ? err : undefined

  return {
    name: err.name,
    code: known?.code ?? "unknown",
    message: err.message,
    context: known ? { ...known.context } : {},
    isOperational: known?.isOperational ?? false,
    timestamp: (known?.timestamp ?? new Date()).toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options.includeStack && err.stack !== undefined && { stack: err.stack }),
  }
}
