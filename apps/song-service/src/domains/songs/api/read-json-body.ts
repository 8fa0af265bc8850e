import { type Context, ValidationError } from "@cantus/server"

/** Parses the request body, turning malformed JSON into a 400. */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json()
  } catch {
    throw ValidationError.field("body", "Request body must be valid JSON")
  }
}
