import type { LoggerOptions } from "@batchweave/logger"
import { z } from "zod"
import { EnvSource } from "../../adapters/config/env-source"
import type { ConfigSource } from "../../ports/config-source"
import { InvalidConfigError } from "../errors/errors"
import { type LoaderEnvConfig, loaderEnvSchema } from "./schema"

export const ENV_PREFIX = "BATCHWEAVE_"

export type FetchConfig = {
  timeoutMs: number
  maxConcurrency?: number
}

export type LoaderConfig = {
  fetch: FetchConfig
  logging: LoggerOptions
}

export type LoadLoaderConfigOptions = {
  /** Applied in order; later sources win. Defaults to `BATCHWEAVE_*` env vars. */
  sources?: ConfigSource[]
}

export function mapEnvToConfig(env: LoaderEnvConfig): LoaderConfig {
  return {
    fetch: {
      timeoutMs: env.FETCH_TIMEOUT_MS,
      ...(env.MAX_CONCURRENCY !== undefined && { maxConcurrency: env.MAX_CONCURRENCY }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

/**
 * Load fetch and logging settings shared by a loader's sources.
 *
 * @example
 * ```ts
 * const config = await loadLoaderConfig()
 * const logger = createPinoLogger(config.logging)
 * const users = createKvSource(fetchUsers, { ...config.fetch, name: "users" }, { logger })
 * ```
 *
 * @throws InvalidConfigError when a value fails validation.
 */
export async function loadLoaderConfig(
  options: LoadLoaderConfigOptions = {},
): Promise<LoaderConfig> {
  const merged: Record<string, unknown> = {}
  const sources = options.sources ?? [new EnvSource({ prefix: ENV_PREFIX })]

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = loaderEnvSchema.safeParse(merged)

  if (!result.success) {
    throw new InvalidConfigError(z.prettifyError(result.error))
  }

  return mapEnvToConfig(result.data)
}
