import {
  ipFromXForwardedFor,
  normalizeRemoteAddress,
  socketRemoteAddress,
} from "../remote-address"

describe("ipFromXForwardedFor", () => {
  const xff = "203.0.113.5, 198.51.100.2, 10.0.0.1"

  it("ignores the header when no proxy is trusted", () => {
    expect(ipFromXForwardedFor(xff, 0)).toBeUndefined()
  })

  it("skips one hop per trusted proxy", () => {
    expect(ipFromXForwardedFor(xff, 1)).toBe("198.51.100.2")
    expect(ipFromXForwardedFor(xff, 2)).toBe("203.0.113.5")
  })

  it("returns undefined when the chain is shorter than the trusted hops", () => {
    expect(ipFromXForwardedFor(xff, 3)).toBeUndefined()
  })

  it("ignores empty entries", () => {
    expect(ipFromXForwardedFor(" , 203.0.113.5 ,, 10.0.0.1", 1)).toBe("203.0.113.5")
  })
})

describe("normalizeRemoteAddress", () => {
  it("unwraps IPv4-mapped IPv6 addresses", () => {
    expect(normalizeRemoteAddress("::ffff:192.0.2.10")).toBe("192.0.2.10")
  })

  it("leaves other addresses alone", () => {
    expect(normalizeRemoteAddress("2001:db8::1")).toBe("2001:db8::1")
  })
})

describe("socketRemoteAddress", () => {
  it("reads env.incoming.socket.remoteAddress", () => {
    const env = { incoming: { socket: { remoteAddress: "::ffff:10.0.0.7" } } }

    expect(socketRemoteAddress(env)).toBe("10.0.0.7")
  })

  it.each([
    ["undefined env", undefined],
    ["env without incoming", {}],
    ["incoming without socket", { incoming: {} }],
    ["empty address", { incoming: { socket: { remoteAddress: "" } } }],
    ["non-string address", { incoming: { socket: { remoteAddress: 42 } } }],
  ])("returns undefined for %s", (_label, env) => {
    expect(socketRemoteAddress(env)).toBeUndefined()
  })
})
