import { mkdir, readFile, rename, writeFile } from "node:fs/promises"
import * as path from "node:path"
import type { PromptKind, PromptStore } from "../model/lyrics.model"

export type FilePromptStoreOptions = {
  dir: string
  /** Served while the file is missing or blank. */
  defaults: Readonly<Record<PromptKind, string>>
}

const FILE_NAMES: Readonly<Record<PromptKind, string>> = {
  system: "lyrics_prompt.txt",
  genre: "genre_prompt.txt",
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class FilePromptStore implements PromptStore {
  constructor(private readonly opts: FilePromptStoreOptions) {}

  async read(kind: PromptKind): Promise<string> {
    try {
      const text = await readFile(this.fileFor(kind), "utf8")
      return text.trim() ? text : this.opts.defaults[kind]
    } catch (err) {
      if (isNotFound(err)) return this.opts.defaults[kind]
      throw err
    }
  }

  async write(kind: PromptKind, text: string): Promise<void> {
    const file = this.fileFor(kind)
    const tmp = `${file}.tmp`

    await mkdir(this.opts.dir, { recursive: true })
    await writeFile(tmp, text, "utf8")
    await rename(tmp, file)
  }

  private fileFor(kind: PromptKind): string {
    return path.join(this.opts.dir, FILE_NAMES[kind])
  }
}
