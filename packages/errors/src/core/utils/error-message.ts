/**
 * Human readable message for any thrown value. Never returns an empty string.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error && err.message.trim() !== "") return err.message
  if (typeof err === "string" && err.trim() !== "") return err
  if (err instanceof Error) return err.name
  return "Unknown error"
}
