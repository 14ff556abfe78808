import { createPinoLogger, type Logger } from "@lazyslice/logger"
import { storageFactoryFor } from "../adapters/create"
import { type LazySequence, lazySequence } from "../core/lazy-sequence"
import type { LazySequenceOptions } from "../ports/sequence-options"
import type { SequenceConfig } from "./schema"

export type SequenceFactoryDeps = {
  /** Default: a pino logger built from `config.logging`. */
  logger?: Logger
}

export type SequenceFactory = <T>(
  iterable: Iterable<T>,
  options?: LazySequenceOptions,
) => LazySequence<T>

/**
 * A `lazySequence` whose storage and logger come from `config`. Options
 * passed per call still win; a storage or logger left `undefined` keeps the
 * configured one.
 */
export function createSequenceFactory(
  config: SequenceConfig,
  deps: SequenceFactoryDeps = {},
): SequenceFactory {
  const storage = storageFactoryFor(config.storage)
  const logger = deps.logger ?? createPinoLogger({}, config.logging)

  return (iterable, options = {}) =>
    lazySequence(iterable, {
      ...options,
      storage: options.storage ?? storage,
      logger: options.logger ?? logger,
    })
}
