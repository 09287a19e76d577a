import { ResponseLogError } from "./base-error"
import { ConfigurationError, SinkWriteError } from "./errors"

export function isResponseLogError(e: unknown): e is ResponseLogError {
  return e instanceof ResponseLogError
}

export function isConfigurationError(e: unknown): e is ConfigurationError {
  return e instanceof ConfigurationError
}

export function isSinkWriteError(e: unknown): e is SinkWriteError {
  return e instanceof SinkWriteError
}
