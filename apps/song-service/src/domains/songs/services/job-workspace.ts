import { mkdir, writeFile } from "node:fs/promises"
import * as path from "node:path"
import type { JobWorkspace } from "../model/inference.model"
import type { SongJobId } from "../model/job.model"

export type JobWorkspacesOptions = {
  outputDir: string
}

/** One private directory per job under the configured output root. */
export class JobWorkspaces {
  constructor(private readonly opts: JobWorkspacesOptions) {}

  for(id: SongJobId): JobWorkspace {
    const dir = path.resolve(this.opts.outputDir, id)

    return {
      dir,
      genrePath: path.join(dir, "genre.txt"),
      lyricsPath: path.join(dir, "lyrics.txt"),
      donePath: path.join(dir, "done.txt"),
    }
  }

  /** Creates the directory and writes the inference inputs. */
  async prepare(id: SongJobId, genre: string, lyrics: string): Promise<JobWorkspace> {
    const workspace = this.for(id)

    await mkdir(workspace.dir, { recursive: true })
    await writeFile(workspace.genrePath, genre, "utf8")
    await writeFile(workspace.lyricsPath, lyrics, "utf8")

    return workspace
  }
}
