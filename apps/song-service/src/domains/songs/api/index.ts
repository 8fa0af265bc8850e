import { type Application, createRouter } from "@cantus/server"
import type { SongServices } from "../composition"
import { downloadSongHandler } from "./download-song.handler"
import { generateLyricsHandler } from "./generate-lyrics.handler"
import { getSongHandler } from "./get-song.handler"
import { getPromptHandler, updatePromptHandler } from "./lyrics-prompt.handler"
import { getProviderHandler, switchProviderHandler } from "./lyrics-provider.handler"
import { repairSongHandler } from "./repair-song.handler"
import { submitSongHandler } from "./submit-song.handler"
import { submitWithGenresHandler } from "./submit-with-genres.handler"

type SongModuleDeps = {
  songs: SongServices
}

export function createSongsModule(deps: SongModuleDeps) {
  return {
    name: "songs",
    register: (api: Application) => {
      const songs = createRouter()

      songs.post("/", submitSongHandler(deps.songs))
      songs.post("/with-genres", submitWithGenresHandler(deps.songs))
      songs.get("/:id", getSongHandler(deps.songs))
      songs.get("/:id/download", downloadSongHandler(deps.songs))
      songs.post("/:id/repair", repairSongHandler(deps.songs))

      api.route("/songs", songs)
    },
  }
}

export function createLyricsModule(deps: SongModuleDeps) {
  return {
    name: "lyrics",
    register: (api: Application) => {
      const lyrics = createRouter()

      lyrics.post("/", generateLyricsHandler(deps.songs))
      lyrics.get("/provider", getProviderHandler(deps.songs))
      lyrics.post("/provider", switchProviderHandler(deps.songs))
      lyrics.get("/prompts/:kind", getPromptHandler(deps.songs))
      lyrics.put("/prompts/:kind", updatePromptHandler(deps.songs))

      api.route("/lyrics", lyrics)
    },
  }
}
