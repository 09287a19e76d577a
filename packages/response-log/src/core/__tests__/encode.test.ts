import { bytes } from "../../tests/fixtures"
import { compactJson, encodeBody, encodeHeaders, isJsonMediaType, mediaType } from "../encode"

describe("mediaType", () => {
  it("drops parameters and lower-cases", () => {
    expect(mediaType("Application/JSON; charset=utf-8")).toBe("application/json")
  })

  it("returns empty string for empty input", () => {
    expect(mediaType("")).toBe("")
  })
})

describe("isJsonMediaType", () => {
  it.each([
    ["application/json", true],
    ["application/json; charset=utf-8", true],
    ["application/problem+json", true],
    ["text/plain", false],
    ["text/json+x", false],
    ["", false],
  ])("%s -> %s", (contentType, expected) => {
    expect(isJsonMediaType(contentType)).toBe(expected)
  })
})

describe("compactJson", () => {
  it("removes insignificant whitespace", () => {
    expect(compactJson('{ "a": 1,\n  "b": [1, 2] }')).toBe('{"a":1,"b":[1,2]}')
  })

  it("returns invalid JSON unchanged", () => {
    expect(compactJson("{not json")).toBe("{not json")
  })

  it("keeps numbers exactly as written", () => {
    expect(compactJson('{"id": 12345678901234567890, "price": 1.0, "rate": 2.50e3}')).toBe(
      '{"id":12345678901234567890,"price":1.0,"rate":2.50e3}',
    )
  })

  it("keeps whitespace and escapes inside strings", () => {
    expect(compactJson('{ "note": "a \\"quoted\\" word\\\\", "b": "x y" }')).toBe(
      '{"note":"a \\"quoted\\" word\\\\","b":"x y"}',
    )
  })
})

describe("encodeBody", () => {
  it("returns empty string for an empty body", () => {
    expect(encodeBody(new Uint8Array(0), "application/json")).toBe("")
  })

  it("compacts JSON bodies", () => {
    expect(encodeBody(bytes('{ "a" : 1 }'), "application/json")).toBe('{"a":1}')
  })

  it("stores large integers in JSON bodies without rounding", () => {
    expect(
      encodeBody(bytes('{"id": 12345678901234567890, "price": 1.0}'), "application/json"),
    ).toBe('{"id":12345678901234567890,"price":1.0}')
  })

  it("keeps non-JSON text as is", () => {
    expect(encodeBody(bytes("a=1&b=2"), "application/x-www-form-urlencoded")).toBe("a=1&b=2")
  })

  it("keeps malformed JSON as text", () => {
    expect(encodeBody(bytes('{"a":'), "application/json")).toBe('{"a":')
  })

  it("decodes multi-byte UTF-8", () => {
    expect(encodeBody(bytes("héllo ✓"), "text/plain")).toBe("héllo ✓")
  })

  it("falls back to base64 for bytes that are not UTF-8", () => {
    const body = new Uint8Array([0xff, 0xfe, 0x00, 0x01])

    expect(encodeBody(body, "application/octet-stream")).toBe("//4AAQ==")
  })
})

describe("encodeHeaders", () => {
  it("renders a compact JSON object", () => {
    expect(encodeHeaders({ "content-type": "application/json", "x-trace": "abc" })).toBe(
      '{"content-type":"application/json","x-trace":"abc"}',
    )
  })

  it("renders no headers as {}", () => {
    expect(encodeHeaders({})).toBe("{}")
  })
})
