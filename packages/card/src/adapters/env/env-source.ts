import type { ConfigSource } from "../../ports/source"

/** Variables read by default: `CARDCHECK_LOG_LEVEL` configures `LOG_LEVEL`, and so on. */
export const ENV_PREFIX = "CARDCHECK_"

export type EnvSourceOptions = {
  /** Default: {@link ENV_PREFIX}. Pass `""` to read every variable. */
  prefix?: string
  /** Default: `process.env` */
  env?: Record<string, string | undefined>
}

/**
 * Reads prefixed environment variables, keyed without the prefix.
 *
 * Values are trimmed, and blank ones are left out so that an exported but empty
 * variable falls back to the schema default instead of failing validation.
 */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ENV_PREFIX
    this.env = options.env ?? process.env
    this.name = `env:${this.prefix}`
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const [key, raw] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix) || key.length === this.prefix.length) continue

      const value = raw?.trim()
      if (value) values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
