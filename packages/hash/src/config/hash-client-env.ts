import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  type IConfig,
  loadConfig,
} from "@hashwire/config"
import { logLevelNames } from "@hashwire/logger"
import { z } from "zod"

export const hashClientEnvSchema = z.object({
  REDIS_URL: z.url().default("redis://localhost:6379"),

  /** Prepended to every hash key, e.g. `app:`. */
  HASH_KEYSPACE_PREFIX: z.string().default(""),

  /** Count hint for full scans when the caller gives none. */
  HASH_SCAN_COUNT: z.coerce.number().int().positive().optional(),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type HashClientEnv = z.infer<typeof hashClientEnvSchema>

export type HashClientSourcesOptions = {
  /** @default ".env" */
  envFile?: string
  /** Directory `envFile` is resolved against. @default process.cwd() */
  cwd?: string
  /** @default process.env */
  env?: Record<string, string | undefined>
}

/**
 * An optional dotenv file, overridden by the process environment.
 */
export function defaultHashClientSources(opts: HashClientSourcesOptions = {}): ConfigSource[] {
  return [
    new DotenvSource({
      file: opts.envFile ?? ".env",
      required: false,
      ...(opts.cwd !== undefined && { cwd: opts.cwd }),
    }),
    new EnvSource({ ...(opts.env !== undefined && { env: opts.env }) }),
  ]
}

/**
 * Loads {@link HashClientEnv}, from {@link defaultHashClientSources} unless
 * sources are given.
 */
export function loadHashClientEnv(
  sources: readonly ConfigSource[] = defaultHashClientSources(),
): Promise<IConfig<HashClientEnv>> {
  return loadConfig({ schema: hashClientEnvSchema, sources })
}
