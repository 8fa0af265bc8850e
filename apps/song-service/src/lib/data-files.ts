import { readFile } from "node:fs/promises"
import * as path from "node:path"
import { fileURLToPath } from "node:url"

const dataDir = fileURLToPath(new URL("../../data/", import.meta.url))

/** Absolute path of a file shipped in the service's `data/` directory. */
export function dataPath(...segments: string[]): string {
  return path.join(dataDir, ...segments)
}

export async function readDataText(...segments: string[]): Promise<string> {
  return readFile(dataPath(...segments), "utf8")
}
