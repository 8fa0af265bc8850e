import { mkdir, readFile, rename, writeFile } from "node:fs/promises"
import * as path from "node:path"
import { errorMessage } from "@cantus/errors"
import type { Logger } from "@cantus/logger"
import { createJsonCodec } from "../../../lib"
import type { ResultStore, SongJob, SongJobId } from "../model/job.model"
import { type JobSnapshot, parseJobSnapshot } from "../model/job.schema"

export type FileResultStoreDeps = {
  logger: Logger
}

export type FileResultStoreOptions = {
  file: string
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Snapshot file written through a sibling temp file and an atomic rename, so
 * a reader never observes a half-written snapshot.
 */
export class FileResultStore implements ResultStore {
  private readonly codec = createJsonCodec<JobSnapshot>(parseJobSnapshot)

  constructor(
    private readonly deps: FileResultStoreDeps,
    private readonly opts: FileResultStoreOptions,
  ) {}

  async load(): Promise<Map<SongJobId, SongJob>> {
    let text: string

    try {
      text = await readFile(this.opts.file, "utf8")
    } catch (err) {
      if (!isNotFound(err)) throw err

      this.deps.logger.info("No result snapshot yet, starting empty", { file: this.opts.file })
      return new Map()
    }

    try {
      const snapshot = this.codec.decode(text)
      return new Map(snapshot.jobs.map((job) => [job.id, job]))
    } catch (err) {
      this.deps.logger.warn("Result snapshot is unreadable, starting empty", {
        file: this.opts.file,
        reason: errorMessage(err),
      })
      return new Map()
    }
  }

  async save(jobs: ReadonlyMap<SongJobId, SongJob>): Promise<void> {
    const snapshot: JobSnapshot = { version: 1, jobs: [...jobs.values()] }
    const tmp = `${this.opts.file}.tmp`

    await mkdir(path.dirname(this.opts.file), { recursive: true })
    await writeFile(tmp, this.codec.encode(snapshot), "utf8")
    await rename(tmp, this.opts.file)
  }
}
