import { Readable } from "node:stream"
import { type Context, parseOrThrow, type RequestHandler } from "@cantus/server"
import type { SongServices } from "../composition"
import { downloadQuerySchema } from "./songs.api.schema"

function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, "_")
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`
}

export function downloadSongHandler({ orchestrator }: SongServices): RequestHandler {
  return async (c: Context) => {
    const query = parseOrThrow(downloadQuerySchema, c.req.query())

    const artifact = await orchestrator.openArtifact(c.req.param("id") ?? "", query.type)

    c.header("content-type", artifact.contentType)
    c.header("content-length", String(artifact.sizeInBytes))
    c.header("content-disposition", contentDisposition(artifact.fileName))

    return c.body(Readable.toWeb(artifact.body))
  }
}
