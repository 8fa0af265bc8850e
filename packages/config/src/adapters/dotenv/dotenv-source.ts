import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { ConfigError } from "../../core/config-error"
import { isMissingFile } from "../../core/is-missing-file"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string
  /** When false a missing file yields no values. */
  required: boolean
  /** @default process.cwd() */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      return parse(await fs.readFile(filePath, "utf-8"))
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) return {}
      throw ConfigError.unreadable(this.name, err)
    }
  }
}
