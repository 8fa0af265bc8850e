import type { Dirent } from "node:fs"
import { readdir, stat } from "node:fs/promises"
import * as path from "node:path"
import type { DiscoveredArtifact } from "../model/inference.model"

export const ARTIFACT_EXTENSIONS: readonly string[] = [
  ".wav",
  ".mp3",
  ".flac",
  ".ogg",
  ".m4a",
  ".aac",
  ".mid",
  ".json",
]

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  ".wav": "audio/wav",
  ".mp3": "audio/mpeg",
  ".flac": "audio/flac",
  ".ogg": "audio/ogg",
  ".m4a": "audio/mp4",
  ".aac": "audio/aac",
  ".mid": "audio/midi",
  ".json": "application/json",
  ".txt": "text/plain; charset=utf-8",
}

export function contentTypeFor(file: string): string {
  return CONTENT_TYPES[path.extname(file).toLowerCase()] ?? "application/octet-stream"
}

const PREFERRED_AUDIO = ".wav"
const OTHER_AUDIO: readonly string[] = [".mp3", ".flac", ".ogg", ".m4a", ".aac"]

export type OutputDiscoveryOptions = {
  /** Relative to the job directory, "/" separated. */
  nestedDir: string
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")
}

/**
 * Finds the artifacts an inference run left in a job directory. Three levels
 * are tried in order (top level, the nested mix directory, everything below)
 * and the first that yields a file wins.
 */
export class OutputDiscovery {
  constructor(private readonly opts: OutputDiscoveryOptions) {}

  async discover(jobDir: string): Promise<DiscoveredArtifact[]> {
    const levels = [
      () => this.scan(jobDir, jobDir, false),
      () => this.scan(jobDir, path.join(jobDir, ...this.opts.nestedDir.split("/")), false),
      () => this.scan(jobDir, jobDir, true),
    ]

    for (const level of levels) {
      const found = await level()
      if (found.length > 0) return found.sort(byName)
    }

    return []
  }

  private async scan(root: string, dir: string, recursive: boolean): Promise<DiscoveredArtifact[]> {
    let entries: Dirent[]

    try {
      entries = await readdir(dir, { withFileTypes: true })
    } catch (err) {
      if (isNotFound(err)) return []
      throw err
    }

    const found: DiscoveredArtifact[] = []

    for (const entry of entries) {
      const full = path.join(dir, entry.name)

      if (entry.isDirectory()) {
        if (recursive) found.push(...(await this.scan(root, full, true)))
        continue
      }

      const extension = path.extname(entry.name).toLowerCase()
      if (!entry.isFile() || !ARTIFACT_EXTENSIONS.includes(extension)) continue

      const info = await stat(full)
      found.push({
        name: path.relative(root, full).split(path.sep).join("/"),
        path: full,
        extension,
        sizeBytes: info.size,
      })
    }

    return found
  }
}

function byName(a: DiscoveredArtifact, b: DiscoveredArtifact): number {
  if (a.name === b.name) return 0
  return a.name < b.name ? -1 : 1
}

/** Largest `.wav`, else the largest file of any other audio type. */
export function pickPrimaryAudio(
  artifacts: readonly DiscoveredArtifact[],
): DiscoveredArtifact | undefined {
  return (
    largest(artifacts.filter((a) => a.extension === PREFERRED_AUDIO)) ??
    largest(artifacts.filter((a) => OTHER_AUDIO.includes(a.extension)))
  )
}

function largest(artifacts: readonly DiscoveredArtifact[]): DiscoveredArtifact | undefined {
  let best: DiscoveredArtifact | undefined

  for (const artifact of artifacts) {
    if (!best || artifact.sizeBytes > best.sizeBytes) best = artifact
  }

  return best
}
