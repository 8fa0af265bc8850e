/**
 * Loads raw values. No validation or coercion happens here; later sources
 * override earlier ones when merged by {@link loadConfig}.
 */
export interface ConfigSource {
  /** Used for provenance, e.g. "env" or "json:config.json". */
  readonly name: string

  /** `undefined` values mean "not provided". */
  load(): Promise<Record<string, unknown>>
}
