import fs from "node:fs/promises"
import path from "node:path"
import { ConfigError } from "../../core/config-error"
import { isMissingFile } from "../../core/is-missing-file"
import type { ConfigSource } from "../../ports/source"

export type JsonSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string
  required: boolean
  /** @default process.cwd() */
  cwd?: string
  /**
   * Upper-case top-level keys so a `{"google_api_key": "..."}` file lines up
   * with env-style names such as `GOOGLE_API_KEY`.
   * @default false
   */
  upperCaseKeys?: boolean
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    let parsed: unknown
    try {
      parsed = JSON.parse(await fs.readFile(filePath, "utf-8"))
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) return {}
      throw ConfigError.unreadable(this.name, err)
    }

    if (!isRecord(parsed)) {
      throw ConfigError.unreadable(this.name, new TypeError("expected a JSON object"))
    }

    if (!this.opts.upperCaseKeys) return parsed

    return Object.fromEntries(
      Object.entries(parsed).map(([key, value]) => [key.toUpperCase(), value]),
    )
  }
}
