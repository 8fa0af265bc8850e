export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Name of the source that supplied `key`, or `"default"` for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  sourcesUsed(): string[]

  /** Keys supplied by some source that the schema does not know about. */
  unknownKeys(): string[]
}
