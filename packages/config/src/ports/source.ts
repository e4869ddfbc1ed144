/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen in `loadConfig`.
 * Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Shown by `explain()`, e.g. "env" or "dotenv:.env.local" */
  readonly name: string

  /** A key mapped to `undefined` counts as not provided. */
  load(): Promise<Record<string, unknown>>
}
