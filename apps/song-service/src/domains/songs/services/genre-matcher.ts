export type GenreMatcherOptions = {
  /** Returned when nothing matches. Added to the vocabulary if absent. */
  fallback: string
}

const ALIASES: Readonly<Record<string, string>> = {
  hiphop: "hip-hop",
  "hip hop": "hip-hop",
  rb: "r&b",
  randb: "r&b",
  "rhythm and blues": "r&b",
  electronica: "electronic",
  "classical music": "classical",
  "pop music": "pop",
  "rock music": "rock",
}

const NON_WORD = /[^\p{L}\p{N}\s]/gu

/**
 * Maps free-text genre tags onto a fixed vocabulary. Pure; safe to share.
 */
export class GenreMatcher {
  private readonly valid: ReadonlySet<string>
  private readonly sorted: readonly string[]
  readonly fallback: string

  constructor(genres: Iterable<string>, opts: GenreMatcherOptions) {
    const fallback = opts.fallback.trim().toLowerCase()
    const set = new Set<string>()

    for (const genre of genres) {
      const normalized = genre.trim().toLowerCase()
      if (normalized) set.add(normalized)
    }
    set.add(fallback)

    this.valid = set
    this.sorted = [...set].sort()
    this.fallback = fallback
  }

  get genres(): readonly string[] {
    return this.sorted
  }

  isValid(genre: string): boolean {
    return this.valid.has(genre)
  }

  /** Never fails; unmatched and blank candidates become the fallback. */
  match(candidate: string): string {
    return this.tryMatch(candidate) ?? this.fallback
  }

  /** `undefined` when no rule applies. A blank candidate yields the fallback. */
  tryMatch(candidate: string): string | undefined {
    const lowered = candidate.trim().toLowerCase()
    if (!lowered) return this.fallback

    if (this.valid.has(lowered)) return lowered

    const stripped = lowered.replace(NON_WORD, "").trim()
    if (stripped && this.valid.has(stripped)) return stripped

    const alias = ALIASES[lowered] ?? ALIASES[stripped]
    if (alias && this.valid.has(alias)) return alias

    const probes = stripped && stripped !== lowered ? [lowered, stripped] : [lowered]
    return this.sorted.find((genre) =>
      probes.some((probe) => genre.includes(probe) || probe.includes(genre)),
    )
  }

  /**
   * Matches each candidate. Fallback results are dropped when anything else
   * matched; duplicates keep their first position.
   */
  matchMany(candidates: readonly string[]): string[] {
    const matched = candidates.map((c) => this.match(c))
    const specific = matched.filter((g) => g !== this.fallback)
    const chosen = specific.length > 0 ? specific : matched

    const unique = [...new Set(chosen)]
    return unique.length > 0 ? unique : [this.fallback]
  }
}
