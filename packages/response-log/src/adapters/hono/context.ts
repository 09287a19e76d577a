import type { InFlightRequest } from "../../core/binding"

export type ResponseLogVariables = {
  /** Set by the response log middleware before the handler runs. */
  responseLog: InFlightRequest
}

declare module "hono" {
  interface ContextVariableMap extends ResponseLogVariables {}
}
