import { readFile } from "node:fs/promises"
import { BaseError } from "@cantus/errors"
import { z } from "zod/mini"

const genreCatalogSchema = z.object({
  genres: z
    .array(z.string().check(z.trim(), z.minLength(1, { error: "Genre cannot be blank" })))
    .check(z.minLength(1, { error: "Genre catalog is empty" })),
})

export class GenreCatalogError extends BaseError<"genre_catalog_invalid"> {
  static invalid(file: string, cause: unknown): GenreCatalogError {
    return new GenreCatalogError(`Genre catalog ${file} is invalid`, {
      code: "genre_catalog_invalid",
      context: { file },
      cause,
      isOperational: false,
    })
  }
}

export function parseGenreCatalog(value: unknown): string[] {
  return genreCatalogSchema.parse(value).genres
}

/** Reads `{ "genres": [...] }`. Any defect fails startup. */
export async function loadGenreCatalog(file: string): Promise<string[]> {
  try {
    return parseGenreCatalog(JSON.parse(await readFile(file, "utf8")))
  } catch (err) {
    throw GenreCatalogError.invalid(file, err)
  }
}
