import type { CapturedRequest, CapturedResponse } from "../ports/exchange"
import type { LogRecord } from "../ports/log-record"
import { encodeBody, encodeHeaders } from "./encode"

export type RecordTarget = {
  measurement: string
  namespace: string
}

export type BuildRecordInput = {
  target: RecordTarget
  startedAt: Date
  request: CapturedRequest
  response: CapturedResponse
  elapsedMs: number
}

export function buildRecord({
  target,
  startedAt,
  request,
  response,
  elapsedMs,
}: BuildRecordInput): LogRecord {
  const requestContentType = request.headers["content-type"] ?? ""

  return {
    measurement: target.measurement,
    time: startedAt,
    tags: {
      namespace: target.namespace,
      path: request.path,
      method: request.method,
    },
    fields: {
      remote_addr: request.remoteAddr,
      headers: encodeHeaders(request.headers),
      full_path: request.fullPath,
      query_string: request.queryString,
      payload: encodeBody(request.body, requestContentType),
      status_code: response.statusCode,
      response: encodeBody(response.body, response.contentType),
      response_content_type: response.contentType,
      response_time: Math.max(0, elapsedMs),
    },
  }
}
