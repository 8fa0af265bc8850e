import type { Context, RequestHandler } from "@cantus/server"
import type { SongServices } from "../composition"
import type { SongStatusView } from "../model/song.model"

export function getSongHandler({ orchestrator }: SongServices): RequestHandler {
  return async (c: Context) => {
    const view = orchestrator.status(c.req.param("id") ?? "")

    return c.json<SongStatusView>(view)
  }
}
