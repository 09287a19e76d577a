export {
  type BodyReadOptions,
  type CaptureOptions,
  captureRequest,
  captureResponse,
  DEFAULT_MAX_BODY_BYTES,
} from "./adapters/hono/capture"
export type { ResponseLogVariables } from "./adapters/hono/context"
export {
  type ResponseLogMiddlewareOptions,
  responseLogMiddleware,
} from "./adapters/hono/middleware"
export {
  ipFromXForwardedFor,
  normalizeRemoteAddress,
  resolveRemoteAddress,
} from "./adapters/hono/remote-address"
export { createAgent } from "./adapters/influx/agent"
export { createInfluxSink, type InfluxSinkFactoryDeps } from "./adapters/influx/create-influx-sink"
export { InfluxSink, type InfluxSinkOptions, type InfluxWriter } from "./adapters/influx/influx-sink"
export { toLine } from "./adapters/influx/line-protocol"
export { measurementSchema, toPoint } from "./adapters/influx/point"
export { type DatagramSocket, UdpSink, type UdpSinkOptions } from "./adapters/influx/udp-sink"
export { MemorySink } from "./adapters/memory/memory-sink"
export type { Clock, Milliseconds } from "./clock/clock"
export { FakeClock } from "./clock/fake-clock"
export { SystemClock } from "./clock/system-clock"
export {
  mapEnvToConfig,
  RESPONSE_LOG_ENV_PREFIX,
  type ResponseLogEnv,
  responseLogEnvSchema,
} from "./config/env-schema"
export { Config, type ConfigSchema, type LoadConfigOptions, loadConfig } from "./config/load"
export {
  type LoadResponseLogConfigOptions,
  loadResponseLogConfig,
} from "./config/load-response-log-config"
export { resolveResponseLogConfig } from "./config/resolve"
export {
  DEFAULT_MEASUREMENT,
  type InfluxConnectionConfig,
  type InfluxConnectionInput,
  type ResponseLogConfig,
  type ResponseLogConfigInput,
} from "./config/schema"
export { DotenvSource, type DotenvSourceOptions } from "./config/sources/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./config/sources/env-source"
export type { ConfigSource } from "./config/sources/source"
export {
  type CompletionOutcome,
  type InFlightRequest,
  ResponseLogBinding,
  type WriteErrorCallback,
  type WriteErrorContext,
} from "./core/binding"
export { buildRecord } from "./core/build-record"
export { compactJson, encodeBody, isJsonMediaType, mediaType } from "./core/encode"
export { createStatusFilter, type StatusFilter } from "./core/status-filter"
export {
  type ErrorCode,
  type ErrorContext,
  ResponseLogError,
  type SerializedError,
  serializeError,
} from "./errors/base-error"
export { type ConfigIssue, ConfigurationError, SinkWriteError } from "./errors/errors"
export {
  isConfigurationError,
  isResponseLogError,
  isSinkWriteError,
} from "./errors/is-response-log-error"
export type { LogContext, LogContextPatch, LogMeta } from "./logger/log-context"
export { type LogLevelName, logLevelNames } from "./logger/log-level"
export type { Logger, LoggerOptions } from "./logger/logger"
export { NullLogger } from "./logger/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./logger/pino-logger"
export type { CapturedRequest, CapturedResponse } from "./ports/exchange"
export type { LogRecord, LogRecordFields, LogRecordTags } from "./ports/log-record"
export type { ResponseLogSink } from "./ports/sink"
export { ResponseRecorder } from "./recorder"
export type { RecorderDependencies, RecorderOptions, SinkFactory } from "./recorder-options"
