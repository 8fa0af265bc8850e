import { BaseError } from "@cantus/errors"

export class InvalidIdError extends BaseError<"invalid_id"> {
  constructor(kind: string, value: unknown) {
    super(`Invalid ${kind}`, { code: "invalid_id", context: { kind, value } })
  }
}

/**
 * Recognizes and parses one kind of branded id where it crosses a boundary
 * (a path parameter, a persisted record).
 */
export interface IdType<T> {
  readonly kind: string

  /** @throws {InvalidIdError} */
  parse(value: unknown): T

  is(value: unknown): value is T
}

export function stringIdType<T extends string>(
  kind: string,
  test: (value: string) => boolean,
): IdType<T> {
  const is = (value: unknown): value is T => typeof value === "string" && test(value)

  return {
    kind,
    is,
    parse(value) {
      if (!is(value)) throw new InvalidIdError(kind, value)
      return value
    },
  }
}
