import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { PinoLogger, type PinoLoggerDeps } from "../../adapters/pino/pino-logger"
import { logLevelNames } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { ConfigSource } from "../../ports/source"

export { ENV_PREFIX } from "../../adapters/env/env-source"

export const cardConfigSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
  SERVICE_NAME: z.string().min(1).default("cardcheck"),
})

export type CardConfig = Readonly<z.infer<typeof cardConfigSchema>>

export type LoadCardConfigOptions = {
  /** Applied in order; later sources override earlier ones. Default: `CARDCHECK_*` env vars */
  sources?: ConfigSource[]
}

/**
 * @throws Error listing every invalid key
 */
export async function loadCardConfig({
  sources,
}: LoadCardConfigOptions = {}): Promise<CardConfig> {
  const merged: Record<string, unknown> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = cardConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  return Object.freeze(result.data)
}

export function createLogger(config: CardConfig, deps: PinoLoggerDeps = {}): Logger {
  return new PinoLogger(
    deps,
    { level: config.LOG_LEVEL, prettify: config.LOG_PRETTY },
    { service: config.SERVICE_NAME },
  )
}
