export { ArrayStorage } from "./adapters/array/array-storage"
export {
  ChunkedStorage,
  type ChunkedStorageOptions,
  DEFAULT_CHUNK_SIZE,
} from "./adapters/chunked/chunked-storage"
export {
  type CreateChunkedStorageOptions,
  chunkedStorage,
  createArrayStorage,
  type StorageSelection,
  storageFactoryFor,
} from "./adapters/create"
export { type ConfigIssue, ConfigError } from "./config/config-error"
export {
  createSequenceFactory,
  type SequenceFactory,
  type SequenceFactoryDeps,
} from "./config/create-sequence-factory"
export {
  type LoadedSequenceConfig,
  type LoadSequenceConfigOptions,
  loadSequenceConfig,
} from "./config/load-sequence-config"
export type { SequenceConfig, SequenceConfigOverrides } from "./config/schema"
export {
  IndexOutOfRangeError,
  InvalidIndexError,
  InvalidStepError,
  isIndexOutOfRangeError,
} from "./core/errors"
export { LazySequence, type LazySequenceDeps, lazySequence } from "./core/lazy-sequence"
export { type ResolveOptions, type SizeOf, Slice } from "./core/slice/slice"
export type { LazySequenceOptions } from "./ports/sequence-options"
export {
  type SequenceStorage,
  type StorageFactory,
  type StorageKind,
  storageKinds,
} from "./ports/storage"
