import { IndexOutOfRangeError } from "../../core/errors"
import { assertInteger } from "../../core/validation/validation"
import type { SequenceStorage } from "../../ports/storage"

export const DEFAULT_CHUNK_SIZE = 1024

export type ChunkedStorageOptions = {
  /** Items per chunk. Must be a positive integer. */
  chunkSize?: number
}

export function resolveChunkSize(options: ChunkedStorageOptions): number {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE

  assertInteger(chunkSize, "chunkSize")
  if (chunkSize < 1) {
    throw new RangeError(`chunkSize must be positive, got: ${chunkSize}`)
  }

  return chunkSize
}

/**
 * Stores items in fixed-size chunks, so growing the cache never copies the
 * items already in it.
 */
export class ChunkedStorage<T> implements SequenceStorage<T> {
  private readonly chunkSize: number
  private readonly chunks: T[][] = []
  private count = 0

  constructor(options: ChunkedStorageOptions = {}) {
    this.chunkSize = resolveChunkSize(options)
  }

  append(item: T): void {
    const offset = this.count % this.chunkSize

    if (offset === 0) {
      this.chunks.push([item])
    } else {
      this.chunks[this.chunks.length - 1].push(item)
    }

    this.count++
  }

  get(index: number): T {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) {
      throw new IndexOutOfRangeError({ index, length: this.count })
    }

    return this.chunks[Math.floor(index / this.chunkSize)][index % this.chunkSize]
  }

  size(): number {
    return this.count
  }

  /** Number of allocated chunks. */
  chunkCount(): number {
    return this.chunks.length
  }
}
