import type { Logger } from "@lazyslice/logger"
import type { SequenceStorage } from "../../ports/storage"

export type Fetched<T> = { found: true; value: T } | { found: false }

export type CachedSourceDeps = {
  logger: Logger
}

/**
 * The producer of a root sequence together with the cache of everything
 * pulled from it so far. Shared by the root and all of its slices.
 *
 * Every pull appends to the cache before the item is handed out, so the
 * cache is always a prefix of the producer's output. Once the producer
 * reports `done` it is not called again.
 */
export class CachedSource<T> {
  private readonly iterator: Iterator<T>
  private done = false

  constructor(
    iterable: Iterable<T>,
    private readonly storage: SequenceStorage<T>,
    private readonly deps: CachedSourceDeps,
  ) {
    this.iterator = iterable[Symbol.iterator]()
  }

  get exhausted(): boolean {
    return this.done
  }

  /** Number of cached items. */
  cached(): number {
    return this.storage.size()
  }

  /** Read a cached item; `position` must be below {@link cached}. */
  get(position: number): T {
    return this.storage.get(position)
  }

  /**
   * Pull the next item into the cache.
   */
  pull(): Fetched<T> {
    const next = this.pullUncached()
    if (next.found) this.storage.append(next.value)

    return next
  }

  /**
   * Pull the next item without caching it. Items read this way are lost to
   * every other view sharing the source.
   */
  pullUncached(): Fetched<T> {
    if (this.done) return { found: false }

    const result = this.iterator.next()

    if (result.done) {
      this.done = true
      this.deps.logger.trace("producer exhausted", { cached: this.storage.size() })

      return { found: false }
    }

    return { found: true, value: result.value }
  }

  /**
   * Return the item at `position`, pulling and caching every item up to it.
   */
  fetch(position: number): Fetched<T> {
    while (this.storage.size() <= position) {
      if (!this.pull().found) return { found: false }
    }

    return { found: true, value: this.storage.get(position) }
  }

  /**
   * Pull everything that is left and return the total size.
   */
  drain(): number {
    if (this.done) return this.storage.size()

    let pulled = 0
    while (this.pull().found) pulled++

    this.deps.logger.debug("source drained", { pulled, total: this.storage.size() })

    return this.storage.size()
  }
}
