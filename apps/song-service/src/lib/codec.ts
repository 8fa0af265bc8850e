import superjson from "superjson"

export interface Codec<T> {
  encode(value: T): string
  decode(text: string): T
}

/**
 * superjson keeps `Date` fields intact across a round trip. `parse` receives
 * the revived value and must narrow it to `T` or throw.
 */
export function createJsonCodec<T>(parse: (value: unknown) => T): Codec<T> {
  return {
    encode: (value: T) => superjson.stringify(value),
    decode: (text: string) => parse(superjson.parse<unknown>(text)),
  }
}
