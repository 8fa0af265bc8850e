export { createLyricsModule, createSongsModule } from "./api"
export { createSongServices, SONGS_PATH } from "./composition"
export type { SongServiceOverrides, SongServices } from "./composition"
