import {
  FakeClock,
  type Logger,
  MemorySink,
  NullLogger,
  ResponseRecorder,
} from "@response-log/core"
import { type MockProxy, mock } from "vitest-mock-extended"
import { createCheckApp } from "../create-check-app"

const START = Date.UTC(2024, 2, 1, 9, 30, 0)

describe("createCheckApp", () => {
  let sink: MemorySink
  let logger: MockProxy<Logger>
  let recorder: ResponseRecorder

  beforeEach(() => {
    sink = new MemorySink()
    logger = mock<Logger>()
    recorder = new ResponseRecorder({
      logger: new NullLogger(),
      clock: new FakeClock(START),
      createSink: () => sink,
    })
  })

  afterEach(async () => {
    await recorder.close()
  })

  it("answers GET /check and records the cycle", async () => {
    const app = createCheckApp({ recorder, logger }, { influx: { database: "test" } })

    const res = await app.request("/check?verbose=1")
    await recorder.flush()

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: "ok" })
    expect(sink.records).toHaveLength(1)
    expect(sink.records[0]?.tags).toEqual({ namespace: "", path: "/check", method: "GET" })
    expect(sink.records[0]?.fields).toMatchObject({
      full_path: "/check?verbose=1",
      query_string: "verbose=1",
      payload: "",
      status_code: 200,
      response: '{"status":"ok"}',
      response_time: 0,
    })
  })

  it("compacts a JSON POST body", async () => {
    const app = createCheckApp(
      { recorder, logger },
      { influx: { database: "test" }, namespace: "check", measurement: "checks" },
    )

    await app.request("/check", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: '{ "name": "probe" }',
    })
    await recorder.flush()

    expect(sink.records[0]?.measurement).toBe("checks")
    expect(sink.records[0]?.tags.namespace).toBe("check")
    expect(sink.records[0]?.fields.payload).toBe('{"name":"probe"}')
  })

  it("records 404s for unknown routes unless filtered", async () => {
    const app = createCheckApp(
      { recorder, logger },
      { influx: { database: "test" }, statusCodeOnly: [200] },
    )

    const missing = await app.request("/missing")
    await app.request("/check")
    await recorder.flush()

    expect(missing.status).toBe(404)
    expect(sink.records).toHaveLength(1)
    expect(sink.records[0]?.fields.status_code).toBe(200)
  })

  it("logs failed writes without affecting the response", async () => {
    const failure = new Error("influx unavailable")
    sink.failWith(failure)
    const app = createCheckApp({ recorder, logger }, { influx: { database: "test" } })

    const res = await app.request("/check", { method: "POST" })
    await recorder.flush()

    expect(res.status).toBe(200)
    expect(logger.error).toHaveBeenCalledTimes(1)
    expect(logger.error).toHaveBeenCalledWith("Response log write failed", {
      err: failure,
      sink: "memory",
      method: "POST",
      path: "/check",
    })
  })
})
