import { bytes, capturedRequest, capturedResponse } from "../../tests/fixtures"
import { buildRecord } from "../build-record"

const startedAt = new Date(Date.UTC(2024, 0, 15, 12, 0, 0))

describe("buildRecord", () => {
  it("maps request and response attributes onto tags and fields", () => {
    const record = buildRecord({
      target: { measurement: "response_log", namespace: "api" },
      startedAt,
      request: capturedRequest({
        method: "POST",
        path: "/check",
        fullPath: "/check?verbose=1",
        queryString: "verbose=1",
        remoteAddr: "10.0.0.7",
        headers: { "content-type": "application/json" },
        body: bytes('{ "a": 1 }'),
      }),
      response: capturedResponse({ statusCode: 201 }),
      elapsedMs: 42.5,
    })

    expect(record).toEqual({
      measurement: "response_log",
      time: startedAt,
      tags: { namespace: "api", path: "/check", method: "POST" },
      fields: {
        remote_addr: "10.0.0.7",
        headers: '{"content-type":"application/json"}',
        full_path: "/check?verbose=1",
        query_string: "verbose=1",
        payload: '{"a":1}',
        status_code: 201,
        response: '{"status":"ok"}',
        response_content_type: "application/json",
        response_time: 42.5,
      },
    })
  })

  it("keeps a non-JSON request payload verbatim", () => {
    const record = buildRecord({
      target: { measurement: "m", namespace: "" },
      startedAt,
      request: capturedRequest({
        headers: { "content-type": "text/plain" },
        body: bytes("  spaced  "),
      }),
      response: capturedResponse(),
      elapsedMs: 1,
    })

    expect(record.fields.payload).toBe("  spaced  ")
  })

  it("never reports a negative response time", () => {
    const record = buildRecord({
      target: { measurement: "m", namespace: "" },
      startedAt,
      request: capturedRequest(),
      response: capturedResponse(),
      elapsedMs: -3,
    })

    expect(record.fields.response_time).toBe(0)
  })

  it("records empty bodies as empty strings", () => {
    const record = buildRecord({
      target: { measurement: "m", namespace: "" },
      startedAt,
      request: capturedRequest(),
      response: capturedResponse({ statusCode: 204, body: new Uint8Array(0), contentType: "" }),
      elapsedMs: 0,
    })

    expect(record.fields.payload).toBe("")
    expect(record.fields.response).toBe("")
    expect(record.fields.response_content_type).toBe("")
  })
})
