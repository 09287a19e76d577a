/**
 * A source of raw configuration values.
 *
 * Sources only load; they do not validate, coerce or merge. They are applied
 * in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /** Used for provenance, e.g. "env", "dotenv:.env". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}

/**
 * Keeps the entries whose key starts with `prefix`, with the prefix removed.
 * An empty prefix keeps everything.
 */
export function pickPrefixed(
  values: Record<string, string | undefined>,
  prefix: string | undefined,
): Record<string, string | undefined> {
  if (!prefix) return { ...values }

  const picked: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) picked[key.slice(prefix.length)] = value
  }

  return picked
}
