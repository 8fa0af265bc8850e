export const SECTION_MARKERS = ["[verse]", "[chorus]", "[bridge]", "[intro]", "[outro]"] as const

export const DEFAULT_LYRICS = `[verse]
A quiet road beneath a silver sky
The engine hums a tune I used to know
Every mile a reason not to say goodbye
Every light a place I'd like to go

[chorus]
Sing it out, let the night run long
Hold the note till the morning comes
We were born to carry on
Hearts in time like a beating drum`

export function hasSectionMarkers(lyrics: string): boolean {
  const lowered = lyrics.toLowerCase()
  return SECTION_MARKERS.some((marker) => lowered.includes(marker))
}

/**
 * Gives unstructured lyrics verse/chorus sections. Text that already carries
 * a section marker is returned unchanged.
 */
export function formatLyrics(lyrics: string | undefined): string {
  const trimmed = lyrics?.trim() ?? ""
  if (!trimmed || trimmed.toLowerCase() === "none") return DEFAULT_LYRICS

  if (hasSectionMarkers(trimmed)) return lyrics ?? trimmed

  const lines = trimmed
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "")

  if (lines.length <= 4) return section("verse", lines)

  if (lines.length <= 8) {
    const mid = Math.floor(lines.length / 2)
    return [section("verse", lines.slice(0, mid)), section("chorus", lines.slice(mid))].join(
      "\n\n",
    )
  }

  const q = Math.floor(lines.length / 4)
  return [
    section("verse", lines.slice(0, q)),
    section("chorus", lines.slice(q, q * 2)),
    section("verse", lines.slice(q * 2, q * 3)),
    section("chorus", lines.slice(q * 3)),
  ].join("\n\n")
}

function section(name: string, lines: string[]): string {
  return [`[${name}]`, ...lines].join("\n")
}
