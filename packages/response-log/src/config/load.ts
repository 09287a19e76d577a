import { ConfigurationError } from "../errors/errors"
import { EnvSource } from "./sources/env-source"
import type { ConfigSource } from "./sources/source"

type SchemaIssue = { path: ReadonlyArray<PropertyKey>; message: string }

/** Anything with a zod-style `safeParse`. */
export type ConfigSchema<T> = {
  safeParse(
    input: unknown,
  ): { success: true; data: T } | { success: false; error: { issues: ReadonlyArray<SchemaIssue> } }
}

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ConfigSchema<T>
  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

/**
 * Validated configuration plus where each value came from.
 */
export class Config<T extends Record<string, unknown>> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<T> {
    return this.data
  }

  /** Source name that supplied `key`, or "default" when the schema filled it in. */
  explain(key: keyof T & string): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  /** Keys some source provided that the schema does not know. */
  unknownKeys(): string[] {
    const known = new Set(Object.keys(this.data))

    return [...this.mergedKeys].filter((k) => !known.has(k))
  }
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<Config<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue
      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw ConfigurationError.fromIssues(result.error.issues, "Configuration validation failed")
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
