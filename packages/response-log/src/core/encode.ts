const utf8 = new TextDecoder("utf-8", { fatal: true })

/** `"Application/JSON; charset=utf-8"` -> `"application/json"` */
export function mediaType(contentType: string): string {
  const [type = ""] = contentType.split(";")
  return type.trim().toLowerCase()
}

export function isJsonMediaType(contentType: string): boolean {
  const type = mediaType(contentType)
  return type === "application/json" || (type.startsWith("application/") && type.endsWith("+json"))
}

/**
 * Renders a body as text for storage.
 *
 * UTF-8 bodies are stored as text, JSON bodies without the whitespace
 * between tokens. Bytes that are not valid UTF-8 are stored as base64.
 */
export function encodeBody(body: Uint8Array, contentType: string): string {
  if (body.byteLength === 0) return ""

  let text: string
  try {
    text = utf8.decode(body)
  } catch {
    return Buffer.from(body).toString("base64")
  }

  return isJsonMediaType(contentType) ? compactJson(text) : text
}

const JSON_WHITESPACE = new Set([" ", "\t", "\n", "\r"])

/**
 * Drops the whitespace between JSON tokens. Tokens are kept as written, so
 * numbers keep their precision and form (`1.0`, `12345678901234567890`).
 * Returns `text` unchanged when it is not valid JSON.
 */
export function compactJson(text: string): string {
  try {
    JSON.parse(text)
  } catch {
    return text
  }

  let out = ""
  let inString = false
  let escaped = false

  for (const ch of text) {
    if (inString) {
      out += ch
      if (escaped) escaped = false
      else if (ch === "\\") escaped = true
      else if (ch === '"') inString = false
      continue
    }

    if (JSON_WHITESPACE.has(ch)) continue
    if (ch === '"') inString = true
    out += ch
  }

  return out
}

export function encodeHeaders(headers: Readonly<Record<string, string>>): string {
  return JSON.stringify(headers)
}
