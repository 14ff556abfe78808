import { createNullLogger, type Logger } from "@lazyslice/logger"
import { createArrayStorage } from "../adapters/create"
import type { LazySequenceOptions } from "../ports/sequence-options"
import type { StorageFactory } from "../ports/storage"
import { IndexOutOfRangeError } from "./errors"
import { Slice, type SizeOf } from "./slice/slice"
import { CachedSource } from "./source/cached-source"
import { assertInteger } from "./validation/validation"

export type LazySequenceDeps = {
  logger: Logger
}

function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b))
}

/**
 * A read-only sequence over a one-shot iterable that pulls items only when
 * a query needs them and caches each one for every view of the same source.
 *
 * Queries that need the total size drain the producer first: `length()`,
 * negative indices or bounds, and anything with a negative step. Forward
 * iteration, forward slicing and non-negative indexing stay lazy, so they
 * work on infinite producers.
 *
 * @example
 * ```ts
 * const records = lazySequence(loadRecords())
 *
 * if (records.isEmpty()) throw new Error("no records found")
 *
 * const [first, second] = records.slice(0, 2)
 *
 * for (const record of records.release()) {
 *   process(record)
 * }
 * ```
 */
export class LazySequence<T> implements Iterable<T> {
  private readonly size: SizeOf = () => this.source.drain()

  /**
   * Views are created by {@link lazySequence} and {@link LazySequence.slice};
   * `indices` is absolute, in producer order.
   */
  constructor(
    private readonly source: CachedSource<T>,
    private readonly indices: Slice,
    private readonly deps: LazySequenceDeps,
  ) {}

  static from<T>(iterable: Iterable<T>, options: LazySequenceOptions = {}): LazySequence<T> {
    return lazySequence(iterable, options)
  }

  /** The flat descriptor of this view against the producer. */
  get descriptor(): Slice {
    return this.indices
  }

  isNonEmpty(): boolean {
    return !this[Symbol.iterator]().next().done
  }

  isEmpty(): boolean {
    return !this.isNonEmpty()
  }

  /**
   * Iterate over the selected items. Each call starts over from the first
   * one, reading the cache before pulling from the producer.
   */
  *[Symbol.iterator](): Generator<T, void, undefined> {
    if (!this.indices.isForward) {
      yield* this.backward()
      return
    }

    const { start = 0, stop, step } = this.indices.positive(this.size)

    for (let position = start; stop === undefined || position < stop; position += step) {
      const item = this.source.fetch(position)
      if (!item.found) return

      yield item.value
    }
  }

  /**
   * Iterate over the selected items without caching the ones not pulled
   * yet, so they can be processed without holding all of them in memory.
   *
   * Neither this sequence nor any sequence sharing its source (its root and
   * every slice of it) may be used once this has been called.
   */
  *release(): Generator<T, void, undefined> {
    this.deps.logger.debug("releasing source", {
      slice: this.indices.toString(),
      cached: this.source.cached(),
    })

    if (!this.indices.isForward) {
      yield* this.backward()
      return
    }

    const { start = 0, stop, step } = this.indices.positive(this.size)
    const inBounds = (position: number) => stop === undefined || position < stop

    let position = start

    for (; inBounds(position) && position < this.source.cached(); position += step) {
      yield this.source.get(position)
    }

    for (let cursor = this.source.cached(); inBounds(position); cursor++) {
      const item = this.source.pullUncached()
      if (!item.found) return

      if (cursor === position) {
        yield item.value
        position += step
      }
    }
  }

  private *backward(): Generator<T, void, undefined> {
    const total = this.source.drain()
    const { start = 0, stop = total, step } = this.indices.reverse(this.size)
    const end = Math.min(stop, total)

    for (let offset = start; offset < end; offset += step) {
      yield this.source.get(total - 1 - offset)
    }
  }

  /**
   * Iterate over the selected items last to first. Drains the producer.
   */
  reversed(): Generator<T, void, undefined> {
    return this.slice(undefined, undefined, -1)[Symbol.iterator]()
  }

  /**
   * Number of selected items. Drains the producer.
   */
  length(): number {
    return this.indices.length(this.size)
  }

  /**
   * Item at `index`; negative indices count from the end (and drain the
   * producer).
   *
   * @throws IndexOutOfRangeError when there is no such item.
   */
  at(index: number): T {
    assertInteger(index, "index")

    let offset = index

    if (offset < 0) {
      const length = this.length()
      offset += length

      if (offset < 0) throw new IndexOutOfRangeError({ index, length })
    }

    const position = this.indices.resolve(offset, this.size)
    const item = this.source.fetch(position)

    if (!item.found) {
      throw new IndexOutOfRangeError({ index, position })
    }

    return item.value
  }

  /**
   * A view of the selected items sliced like a dynamic array. Shares this
   * sequence's producer and cache.
   *
   * @throws InvalidStepError when `step` is zero.
   */
  slice(slice: Slice): LazySequence<T>
  slice(start?: number, stop?: number, step?: number): LazySequence<T>
  slice(startOrSlice?: number | Slice, stop?: number, step?: number): LazySequence<T> {
    const relative =
      startOrSlice instanceof Slice ? startOrSlice : new Slice(startOrSlice, stop, step)
    const indices = this.indices.compose(relative, this.size)

    this.deps.logger.trace("slice composed", { slice: indices.toString() })

    return new LazySequence(this.source, indices, this.deps)
  }

  includes(value: T): boolean {
    return this.indexOf(value) !== -1
  }

  /**
   * Index of the first item equal to `value` (SameValueZero), or -1.
   * Pulls only as far as the first match.
   */
  indexOf(value: T): number {
    let index = 0

    for (const item of this) {
      if (sameValueZero(item, value)) return index
      index++
    }

    return -1
  }

  count(value: T): number {
    let total = 0

    for (const item of this) {
      if (sameValueZero(item, value)) total++
    }

    return total
  }

  toArray(): T[] {
    return Array.from(this)
  }
}

/**
 * Wrap `iterable` in a {@link LazySequence}. The iterable's iterator is
 * requested once, here, and never rewound.
 */
export function lazySequence<T>(
  iterable: Iterable<T>,
  options: LazySequenceOptions = {},
): LazySequence<T> {
  const indices = new Slice(options.start, options.stop, options.step)
  const logger = options.logger ?? createNullLogger()
  const createStorage: StorageFactory = options.storage ?? createArrayStorage

  const source = new CachedSource(iterable, createStorage<T>(), {
    logger: logger.child({ module: "cached-source" }),
  })

  return new LazySequence(source, indices, {
    logger: logger.child({ module: "lazy-sequence" }),
  })
}
