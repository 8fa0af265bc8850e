import type { IdGenerator } from "../ports/id-generator"
import type { IdType } from "./id-type"

export type IdCodec<T> = IdType<T> & IdGenerator<T>

/**
 * Every generated value goes through `type.parse`, so a generator that
 * drifts from the id format fails loudly instead of minting bad ids.
 */
export const withGenerator = <T>(type: IdType<T>, raw: IdGenerator<string>): IdCodec<T> => ({
  ...type,
  generate: () => type.parse(raw.generate()),
})
