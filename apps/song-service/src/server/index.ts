export { buildServer, errorMappings } from "./build-server"
export type { BuiltServer } from "./build-server"
export { run } from "./run"
