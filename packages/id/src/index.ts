export type { Brand } from "./core/brand"
export { withGenerator } from "./core/id-codec"
export type { IdCodec } from "./core/id-codec"
export { InvalidIdError, stringIdType } from "./core/id-type"
export type { IdType } from "./core/id-type"
export type { IdGenerator } from "./ports/id-generator"
export { isUuid, uuidV4, uuidV7 } from "./adapters/uuid"
