import type { SequenceStorage, StorageFactory, StorageKind } from "../ports/storage"
import { ArrayStorage } from "./array/array-storage"
import {
  ChunkedStorage,
  type ChunkedStorageOptions,
  resolveChunkSize,
} from "./chunked/chunked-storage"

export function createArrayStorage<T>(): SequenceStorage<T> {
  return new ArrayStorage<T>()
}

export type CreateChunkedStorageOptions = ChunkedStorageOptions

/**
 * Returns a {@link StorageFactory} producing chunked caches of the given
 * chunk size. The size is validated here, not on first use.
 */
export function chunkedStorage(options: CreateChunkedStorageOptions = {}): StorageFactory {
  const chunkSize = resolveChunkSize(options)

  return <T>() => new ChunkedStorage<T>({ chunkSize })
}

export type StorageSelection = {
  kind: StorageKind
  chunkSize?: number
}

export function storageFactoryFor(selection: StorageSelection): StorageFactory {
  switch (selection.kind) {
    case "array":
      return createArrayStorage
    case "chunked":
      return chunkedStorage(
        selection.chunkSize === undefined ? {} : { chunkSize: selection.chunkSize },
      )
  }
}
