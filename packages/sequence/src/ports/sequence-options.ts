import type { Logger } from "@lazyslice/logger"
import type { StorageFactory } from "./storage"

export type LazySequenceOptions = {
  /**
   * Creates the cache shared by the sequence and its slices.
   *
   * Default: `createArrayStorage`.
   */
  storage?: StorageFactory

  /**
   * A slice applied up front, equivalent to calling `slice(start, stop, step)`
   * on the new sequence. A zero step throws `InvalidStepError` right away.
   */
  start?: number
  stop?: number
  step?: number

  /** Default: a `NullLogger`. */
  logger?: Logger
}
