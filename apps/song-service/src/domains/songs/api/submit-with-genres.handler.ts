import { type Context, parseOrThrow, type RequestHandler } from "@cantus/server"
import type { SongServices } from "../composition"
import type { WithGenresResult } from "../model/song.model"
import { readJsonBody } from "./read-json-body"
import { withGenresRequestSchema } from "./songs.api.schema"

export function submitWithGenresHandler({ orchestrator }: SongServices): RequestHandler {
  return async (c: Context) => {
    const body = parseOrThrow(withGenresRequestSchema, await readJsonBody(c))

    const result = await orchestrator.submitWithGenres(body)

    return c.json<WithGenresResult>(result, 202)
  }
}
