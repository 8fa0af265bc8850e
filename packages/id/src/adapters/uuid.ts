import { v4, v7, validate, version } from "uuid"
import type { IdGenerator } from "../ports/id-generator"

export const uuidV4: IdGenerator<string> = { generate: () => v4() }
export const uuidV7: IdGenerator<string> = { generate: () => v7() }

export function isUuid(value: string, expectedVersion?: 4 | 7): boolean {
  if (!validate(value)) return false
  return expectedVersion === undefined || version(value) === expectedVersion
}
