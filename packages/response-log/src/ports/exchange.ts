/**
 * Framework-independent view of an incoming request, taken before the
 * handler runs.
 */
export type CapturedRequest = {
  method: string
  path: string
  /** Path plus `?query` when a query exists. */
  fullPath: string
  /** Raw query string without the leading `?`, or "". */
  queryString: string
  remoteAddr: string
  /** Lower-cased header names. */
  headers: Record<string, string>
  body: Uint8Array
}

export type CapturedResponse = {
  statusCode: number
  body: Uint8Array
  contentType: string
}
