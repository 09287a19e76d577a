/**
 * Indexed dimensions of a record. Fixed when the request starts.
 */
export type LogRecordTags = {
  namespace: string
  path: string
  method: string
}

/**
 * Unindexed values of a record.
 *
 * @remarks
 * `headers` is a compact JSON object of lower-cased header names to values.
 * `response_time` is in milliseconds.
 */
export type LogRecordFields = {
  remote_addr: string
  headers: string
  full_path: string
  query_string: string
  payload: string
  status_code: number
  response: string
  response_content_type: string
  response_time: number
}

export type LogRecord = {
  measurement: string
  /** UTC capture timestamp, taken when the request started. */
  time: Date
  tags: LogRecordTags
  fields: LogRecordFields
}
