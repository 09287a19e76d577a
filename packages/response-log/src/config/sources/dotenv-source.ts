import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { type ConfigSource, pickPrefixed } from "./source"

export type DotenvSourceOptions = {
  /**
   * Path to the dotenv file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /** When `false`, a missing file yields no values instead of throwing. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /** Only keys with this prefix are kept, with the prefix removed. */
  prefix?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return pickPrefixed(parse(content), this.opts.prefix)
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) return {}
      throw err
    }
  }
}
