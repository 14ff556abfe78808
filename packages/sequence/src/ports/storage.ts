/**
 * Append-only container holding the items pulled from a producer, in pull
 * order. Every view derived from one root sequence reads and appends to the
 * same instance.
 *
 * Implementations must keep appends amortised O(1) and reads by position
 * O(1). Items are never removed or reordered.
 */
export interface SequenceStorage<T> {
  /**
   * Add an item after the last stored one.
   */
  append(item: T): void

  /**
   * Return the item stored at `index`.
   *
   * @throws IndexOutOfRangeError when `index` is outside `[0, size())`.
   */
  get(index: number): T

  /**
   * Number of stored items.
   */
  size(): number
}

/**
 * Creates the cache for a new root sequence.
 */
export type StorageFactory = <T>() => SequenceStorage<T>

export type ArrayStorageKind = "array"
export type ChunkedStorageKind = "chunked"

export type StorageKind = ArrayStorageKind | ChunkedStorageKind

export const storageKinds = ["array", "chunked"] as const satisfies readonly StorageKind[]
