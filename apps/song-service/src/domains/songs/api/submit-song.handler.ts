import { type Context, parseOrThrow, type RequestHandler } from "@cantus/server"
import type { SongServices } from "../composition"
import type { SubmitSongResult } from "../model/song.model"
import { readJsonBody } from "./read-json-body"
import { submitSongRequestSchema } from "./songs.api.schema"

export function submitSongHandler({ orchestrator }: SongServices): RequestHandler {
  return async (c: Context) => {
    const body = parseOrThrow(submitSongRequestSchema, await readJsonBody(c))

    const result = await orchestrator.submit(body)

    return c.json<SubmitSongResult>(result, 202)
  }
}
