import type { CapturedRequest, CapturedResponse } from "../ports/exchange"
import type { LogRecord } from "../ports/log-record"

const encoder = new TextEncoder()

export function bytes(text: string): Uint8Array {
  return encoder.encode(text)
}

export function capturedRequest(overrides: Partial<CapturedRequest> = {}): CapturedRequest {
  return {
    method: "GET",
    path: "/check",
    fullPath: "/check",
    queryString: "",
    remoteAddr: "127.0.0.1",
    headers: {},
    body: new Uint8Array(0),
    ...overrides,
  }
}

export function capturedResponse(overrides: Partial<CapturedResponse> = {}): CapturedResponse {
  return {
    statusCode: 200,
    body: bytes('{"status":"ok"}'),
    contentType: "application/json",
    ...overrides,
  }
}

export function logRecord(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    measurement: "response_log",
    time: new Date(Date.UTC(2024, 0, 15, 12, 0, 0)),
    tags: { namespace: "api", path: "/check", method: "GET" },
    fields: {
      remote_addr: "127.0.0.1",
      headers: "{}",
      full_path: "/check",
      query_string: "",
      payload: "",
      status_code: 200,
      response: '{"status":"ok"}',
      response_content_type: "application/json",
      response_time: 12.5,
    },
    ...overrides,
  }
}
