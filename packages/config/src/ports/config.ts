/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ AWS_REGION: z._default(z.string(), "us-east-1") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("AWS_REGION")     // "eu-west-1"
 * config.explain("AWS_REGION") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /** Name of the source that supplied `key`, or "default". */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that supplied at least one key, in application order. */
  sourcesUsed(): string[]

  /** Keys supplied by sources but unknown to the schema. */
  unknownKeys(): string[]
}
