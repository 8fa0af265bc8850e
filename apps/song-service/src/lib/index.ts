export { createJsonCodec } from "./codec"
export type { Codec } from "./codec"
export { dataPath, readDataText } from "./data-files"
export { Mutex } from "./mutex"
