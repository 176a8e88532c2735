import { logLevelNames } from "@batchweave/logger"
import { z } from "zod"

const flag = z.union([z.boolean(), z.stringbool()])

/**
 * Raw keys, as read from `BATCHWEAVE_*` environment variables (prefix stripped).
 */
export const loaderEnvSchema = z.object({
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  MAX_CONCURRENCY: z.coerce.number().int().positive().optional(),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
})

export type LoaderEnvConfig = z.infer<typeof loaderEnvSchema>
