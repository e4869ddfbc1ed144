import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys with this prefix are loaded; the prefix is stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Process environment as a config source. A variable exported but left
 * empty (`export AWS_PROFILE=`) counts as unset, as it does for the AWS
 * SDK, so schema defaults and SDK resolution still apply.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, string>> {
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix) || value === undefined || value.trim() === "") continue

      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
