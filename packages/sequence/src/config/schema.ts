import { type LogLevelName, logLevelNames } from "@lazyslice/logger"
import { z } from "zod"
import { DEFAULT_CHUNK_SIZE } from "../adapters/chunked/chunked-storage"
import { type StorageKind, storageKinds } from "../ports/storage"

export const ENV_PREFIX = "LAZYSEQ_"

/**
 * Environment variables read by {@link loadSequenceConfig}, without the
 * `LAZYSEQ_` prefix.
 */
export const envSchema = z.object({
  STORAGE: z.enum(storageKinds).default("array"),
  CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type SequenceConfig = {
  storage: {
    kind: StorageKind
    chunkSize: number
  }
  logging: {
    level: LogLevelName
    prettify: boolean
  }
}

export type SequenceConfigOverrides = {
  storage?: Partial<SequenceConfig["storage"]>
  logging?: Partial<SequenceConfig["logging"]>
}

export function mapEnvToConfig(env: EnvConfig): SequenceConfig {
  return {
    storage: {
      kind: env.STORAGE,
      chunkSize: env.CHUNK_SIZE,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}
