import { z } from "zod"
import { type ConfigIssue, ConfigError } from "./config-error"
import {
  ENV_PREFIX,
  envSchema,
  mapEnvToConfig,
  type SequenceConfig,
  type SequenceConfigOverrides,
} from "./schema"

export type LoadSequenceConfigOptions = {
  /** Default: `process.env`. */
  env?: Record<string, string | undefined>
  /** Applied after the environment; wins on conflicts. */
  overrides?: SequenceConfigOverrides
}

type EnvKey = keyof z.infer<typeof envSchema>

export type LoadedSequenceConfig = {
  readonly value: SequenceConfig

  /**
   * Where a variable's final value came from: `"env:LAZYSEQ_<KEY>"` or
   * `"default"`. Overrides are not tracked per variable.
   */
  explain(key: EnvKey): string

  /**
   * `LAZYSEQ_` variables that the schema does not know, usually typos.
   */
  unknownKeys(): string[]
}

function formatPath(path: readonly PropertyKey[]): string {
  return path.map((part) => (typeof part === "number" ? `[${part}]` : String(part))).join(".")
}

function readPrefixed(env: Record<string, string | undefined>): Record<string, string> {
  const values: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined) {
      values[key.slice(ENV_PREFIX.length)] = value
    }
  }

  return values
}

/**
 * Read sequence defaults from `LAZYSEQ_*` environment variables.
 *
 * @throws ConfigError listing every invalid variable.
 */
export function loadSequenceConfig(
  options: LoadSequenceConfigOptions = {},
): LoadedSequenceConfig {
  const raw = readPrefixed(options.env ?? process.env)
  const result = envSchema.safeParse(raw)

  if (!result.success) {
    const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
      path: `${ENV_PREFIX}${formatPath(issue.path)}`,
      message: issue.message,
    }))

    throw new ConfigError(
      `Sequence configuration is invalid:\n${z.prettifyError(result.error)}`,
      issues,
    )
  }

  const base = mapEnvToConfig(result.data)
  const value: SequenceConfig = {
    storage: { ...base.storage, ...options.overrides?.storage },
    logging: { ...base.logging, ...options.overrides?.logging },
  }
  const known = new Set(Object.keys(envSchema.shape))

  return {
    value,
    explain: (key) => (key in raw ? `env:${ENV_PREFIX}${key}` : "default"),
    unknownKeys: () =>
      Object.keys(raw)
        .filter((key) => !known.has(key))
        .map((key) => `${ENV_PREFIX}${key}`),
  }
}
