import type { Context } from "hono"
import { isNonEmptyString } from "../../utils/is-non-empty-string"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Returns the client from X-Forwarded-For given N trusted proxies.
 *
 * XFF: "client, proxy1, proxy2" (proxy2 is closest to the server)
 * trustedProxies = 1 -> "proxy1"
 * trustedProxies = 2 -> "client"
 */
export function ipFromXForwardedFor(
  xForwardedFor: string,
  trustedProxies: number,
): string | undefined {
  if (trustedProxies <= 0) return undefined

  const chain = xForwardedFor
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)

  const idx = chain.length - 1 - trustedProxies
  if (idx < 0) return undefined

  return chain[idx]
}

/** `::ffff:1.2.3.4` (IPv4-mapped IPv6) -> `1.2.3.4` */
export function normalizeRemoteAddress(ip: string): string {
  return ip.startsWith("::ffff:") ? ip.slice("::ffff:".length) : ip
}

/**
 * Reads the peer address from the Node request that @hono/node-server
 * passes as `env.incoming`. Other runtimes yield `undefined`.
 */
export function socketRemoteAddress(env: unknown): string | undefined {
  if (!isRecord(env) || !isRecord(env.incoming)) return undefined

  const socket = env.incoming.socket
  if (!isRecord(socket) || !isNonEmptyString(socket.remoteAddress)) return undefined

  const normalized = normalizeRemoteAddress(socket.remoteAddress).trim()
  return normalized.length > 0 ? normalized : undefined
}

export function resolveRemoteAddress(c: Context, trustedProxies: number): string {
  const xff = c.req.header("x-forwarded-for")
  const forwarded = isNonEmptyString(xff) ? ipFromXForwardedFor(xff, trustedProxies) : undefined

  return forwarded ?? socketRemoteAddress(c.env) ?? ""
}
