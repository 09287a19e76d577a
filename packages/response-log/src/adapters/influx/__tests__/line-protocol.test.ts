import { logRecord } from "../../../tests/fixtures"
import { toLine } from "../line-protocol"

describe("toLine", () => {
  it("serializes tags, typed fields and a nanosecond timestamp", () => {
    expect(toLine(logRecord())).toBe(
      "response_log,namespace=api,path=/check,method=GET " +
        'remote_addr="127.0.0.1",headers="{}",full_path="/check",query_string="",payload="",' +
        'status_code=200i,response="{\\"status\\":\\"ok\\"}",' +
        'response_content_type="application/json",response_time=12.5 ' +
        "1705320000000000000",
    )
  })

  it("omits empty tags", () => {
    const record = logRecord({ tags: { namespace: "", path: "/check", method: "GET" } })

    expect(toLine(record).startsWith("response_log,path=/check,method=GET ")).toBe(true)
  })

  it("escapes spaces and commas in tag values", () => {
    const record = logRecord({ tags: { namespace: "api", path: "/a b,c", method: "GET" } })

    expect(toLine(record).startsWith("response_log,namespace=api,path=/a\\ b\\,c,method=GET ")).toBe(
      true,
    )
  })

  it("escapes backslashes and quotes in string fields", () => {
    const base = logRecord()
    const record = logRecord({ fields: { ...base.fields, payload: 'say "hi" \\o/' } })

    expect(toLine(record)).toContain(',payload="say \\"hi\\" \\\\o/",')
  })
})
