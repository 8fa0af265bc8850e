import type { Context, RequestHandler } from "@cantus/server"
import type { SongServices } from "../composition"
import type { RepairResult } from "../model/song.model"

export function repairSongHandler({ orchestrator }: SongServices): RequestHandler {
  return async (c: Context) => {
    const result = await orchestrator.repair(c.req.param("id") ?? "")

    return c.json<RepairResult>(result)
  }
}
