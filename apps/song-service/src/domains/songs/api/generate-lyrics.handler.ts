import { type Context, parseOrThrow, type RequestHandler } from "@cantus/server"
import type { SongServices } from "../composition"
import type { GeneratedLyrics } from "../model/lyrics.model"
import { generateLyricsRequestSchema } from "./lyrics.api.schema"
import { readJsonBody } from "./read-json-body"

export function generateLyricsHandler({ lyrics }: SongServices): RequestHandler {
  return async (c: Context) => {
    const { prompt } = parseOrThrow(generateLyricsRequestSchema, await readJsonBody(c))

    return c.json<GeneratedLyrics>(await lyrics.generateLyrics(prompt))
  }
}
