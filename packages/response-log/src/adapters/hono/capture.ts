import type { ReadableStreamDefaultReader } from "node:stream/web"
import type { Context } from "hono"
import { mediaType } from "../../core/encode"
import type { Logger } from "../../logger/logger"
import type { CapturedRequest, CapturedResponse } from "../../ports/exchange"
import { resolveRemoteAddress } from "./remote-address"

export type BodyReadOptions = {
  /** Bodies longer than this are recorded as empty. @default 1 MiB */
  maxBodyBytes?: number
  /** Stops an unfinished read; the body is then recorded as empty. */
  signal?: AbortSignal
  logger?: Logger
}

export type CaptureOptions = BodyReadOptions & {
  /** Proxies in front of the app whose X-Forwarded-For entries are trusted. @default 0 */
  trustedProxies?: number
}

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024

const EMPTY = new Uint8Array(0)
const STOPPED: unique symbol = Symbol("stopped")

/** Media types whose bodies may never end and are not read. */
const STREAMING_TYPES = new Set(["text/event-stream"])

function rawQuery(url: string): string {
  const idx = url.indexOf("?")
  return idx === -1 ? "" : url.slice(idx + 1)
}

function headerRecord(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {}
  headers.forEach((value, key) => {
    out[key] = value
  })
  return out
}

/**
 * Cancels our branch of the clone. A tee branch's cancel settles only once
 * the other branch is finished too, so it is not awaited.
 */
function stopReading(
  reader: ReadableStreamDefaultReader<unknown>,
  logger: Logger | undefined,
): Uint8Array {
  reader.cancel().catch((err: unknown) => {
    logger?.debug("Failed to cancel body read", { err })
  })
  return EMPTY
}

/**
 * Reads a clone of the body. The clone is taken before the first await, so
 * the caller may hand `message` on as soon as this returns its promise.
 */
async function readBody(
  message: Request | Response,
  options: BodyReadOptions,
): Promise<Uint8Array> {
  if (message.body === null) return EMPTY

  const stream = message.clone().body
  if (stream === null) return EMPTY

  const reader = stream.getReader()
  const max = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES
  const { signal } = options

  let onAbort: (() => void) | undefined
  const stopped = new Promise<typeof STOPPED>((resolve) => {
    if (!signal) return
    if (signal.aborted) {
      resolve(STOPPED)
      return
    }
    onAbort = () => resolve(STOPPED)
    signal.addEventListener("abort", onAbort, { once: true })
  })

  const chunks: Uint8Array[] = []
  let size = 0

  try {
    for (;;) {
      const step = await Promise.race([reader.read(), stopped])

      if (step === STOPPED) return stopReading(reader, options.logger)
      if (step.done) break

      const chunk: unknown = step.value
      if (!(chunk instanceof Uint8Array)) {
        throw new TypeError("Body stream produced a non-byte chunk")
      }

      size += chunk.byteLength
      if (size > max) return stopReading(reader, options.logger)
      chunks.push(chunk)
    }
  } finally {
    if (onAbort) signal?.removeEventListener("abort", onAbort)
  }

  return Buffer.concat(chunks)
}

/**
 * Captures the request without consuming it; the handler can still read
 * the body.
 */
export async function captureRequest(
  c: Context,
  options: CaptureOptions = {},
): Promise<CapturedRequest> {
  const path = c.req.path
  const queryString = rawQuery(c.req.url)

  return {
    method: c.req.method,
    path,
    fullPath: queryString ? `${path}?${queryString}` : path,
    queryString,
    remoteAddr: resolveRemoteAddress(c, Math.max(0, options.trustedProxies ?? 0)),
    headers: headerRecord(c.req.raw.headers),
    body: await readBody(c.req.raw, options),
  }
}

/**
 * Captures the response. `res` is cloned synchronously, so it can go to the
 * client while the returned promise is pending. Streams are read as they
 * flow; `options.signal` ends a read that never finishes.
 */
export async function captureResponse(
  res: Response,
  options: BodyReadOptions = {},
): Promise<CapturedResponse> {
  const contentType = res.headers.get("content-type") ?? ""
  const streaming = STREAMING_TYPES.has(mediaType(contentType))

  return {
    statusCode: res.status,
    body: streaming ? EMPTY : await readBody(res, options),
    contentType,
  }
}
