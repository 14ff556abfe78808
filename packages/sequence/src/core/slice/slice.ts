import { IndexOutOfRangeError } from "../errors"
import { assertOptionalInteger, assertValidStep } from "../validation/validation"

/**
 * Total number of items the producer yields. Evaluated only by operations
 * that cannot do without it, since answering may drain the producer.
 */
export type SizeOf = () => number

export type ResolveOptions = {
  /**
   * Throw {@link IndexOutOfRangeError} for indices outside the slice
   * instead of clamping them to the nearest valid position.
   *
   * @default true
   */
  strict?: boolean
}

function minBound(bound: number | undefined, other: number): number {
  return bound === undefined ? other : Math.min(bound, other)
}

/**
 * An immutable `start:stop:step` descriptor with the semantics of slicing
 * a dynamic array: negative bounds count from the end, bounds past either
 * end are clipped, a negative step walks backwards from `start` (default:
 * the last item) towards `stop` (default: through the first item).
 *
 * Bounds are always absolute positions in producer order. Composing a slice
 * with a slice of it yields another flat descriptor.
 */
export class Slice {
  static readonly identity = new Slice()
  static readonly empty = new Slice(0, 0, 1)

  readonly start: number | undefined
  readonly stop: number | undefined
  readonly step: number

  constructor(start?: number, stop?: number, step: number = 1) {
    assertOptionalInteger(start, "start")
    assertOptionalInteger(stop, "stop")
    assertValidStep(step)

    this.start = start
    this.stop = stop
    this.step = step

    Object.freeze(this)
  }

  static of(start?: number, stop?: number, step?: number): Slice {
    return new Slice(start, stop, step)
  }

  get isForward(): boolean {
    return this.step > 0
  }

  hasNegativeBounds(): boolean {
    return (
      (this.start !== undefined && this.start < 0) || (this.stop !== undefined && this.stop < 0)
    )
  }

  /**
   * Resolve negative bounds against the total size. Returns `this` when
   * there is nothing to resolve, without evaluating `size`.
   *
   * A stop that lands before the first item becomes `0` going forwards but
   * `undefined` going backwards, so that a reverse walk still reaches
   * position 0. A backward walk starting before the first item is empty.
   */
  positive(size: SizeOf): Slice {
    if (!this.hasNegativeBounds()) return this

    const total = size()
    let { start, stop } = this

    if (start !== undefined && start < 0) {
      start += total

      if (start < 0) {
        if (!this.isForward) return new Slice(0, 0, this.step)
        start = 0
      }
    }

    if (stop !== undefined && stop < 0) {
      stop += total

      if (stop < 0) stop = this.isForward ? 0 : undefined
    }

    return new Slice(start, stop, this.step)
  }

  /**
   * Number of items selected out of `size()` items.
   */
  length(size: SizeOf): number {
    const forward = this.isForward ? this.positive(size) : this.reverse(size)
    let count = size()

    if (forward.stop !== undefined) count = Math.min(count, forward.stop)
    if (forward.start !== undefined) count = Math.max(0, count - forward.start)

    // ceil(count / step) in integers
    return count > 0 ? 1 + Math.floor((count - 1) / forward.step) : 0
  }

  /**
   * The forward slice that selects, from the reversed items, what this
   * backward slice selects from the items in producer order. Forward
   * slices are returned as they are.
   */
  reverse(size: SizeOf): Slice {
    if (this.isForward) return this

    const { start, stop, step } = this.positive(size)
    const total = size()
    const last = total - 1
    const first = Math.min(start ?? last, last)

    return new Slice(
      Math.max(0, last - first),
      stop === undefined ? total : Math.max(0, last - stop),
      -step,
    )
  }

  /**
   * Map a non-negative index within the slice to a producer position.
   *
   * Forward slices only need `size` when their bounds are negative; the
   * returned position may still lie past the end of the producer.
   */
  resolve(index: number, size: SizeOf, options: ResolveOptions = {}): number {
    const strict = options.strict ?? true

    return this.isForward
      ? this.resolveForward(index, size, strict)
      : this.resolveBackward(index, size, strict)
  }

  private resolveForward(index: number, size: SizeOf, strict: boolean): number {
    const { start = 0, stop, step } = this.positive(size)
    const position = start + index * step

    if (stop !== undefined && position >= stop) {
      if (strict) throw new IndexOutOfRangeError({ index, position })

      return Math.max(0, stop - 1)
    }

    return position
  }

  private resolveBackward(index: number, size: SizeOf, strict: boolean): number {
    const { start, stop, step } = this.positive(size)
    const last = size() - 1
    const position = Math.min(start ?? last, last) + index * step

    if (position < 0 || (stop !== undefined && position <= stop)) {
      if (strict) throw new IndexOutOfRangeError({ index, position })

      return stop === undefined ? 0 : stop + 1
    }

    return position
  }

  /**
   * The single slice equivalent to taking `child` of the items this slice
   * selects. `child` is relative to this slice; its negative bounds are
   * resolved against this slice's length.
   *
   * Composing two forward slices with non-negative bounds never evaluates
   * `size`.
   */
  compose(child: Slice, size: SizeOf): Slice {
    const outer = this.positive(size)
    const relative = child.positive(() => outer.length(size))
    const step = outer.step * relative.step

    return outer.isForward
      ? outer.composeForward(relative, step, size)
      : outer.composeBackward(relative, step, size)
  }

  private composeForward(child: Slice, step: number, size: SizeOf): Slice {
    const origin = this.start ?? 0
    const at = (index: number) => origin + index * this.step

    if (child.isForward) {
      const stop = child.stop === undefined ? this.stop : minBound(this.stop, at(child.stop))

      return new Slice(at(child.start ?? 0), stop, step)
    }

    const length = this.length(size)
    if (length === 0) return Slice.empty

    const first = Math.min(child.start ?? length - 1, length - 1)

    if (child.stop !== undefined) return new Slice(at(first), at(child.stop), step)

    // Walk down through logical index 0. There is no non-negative exclusive
    // stop below position 0, so an outer slice starting there stays open.
    return new Slice(at(first), origin > 0 ? origin - 1 : undefined, step)
  }

  private composeBackward(child: Slice, step: number, size: SizeOf): Slice {
    const length = this.length(size)
    if (length === 0) return Slice.empty

    const last = size() - 1
    const origin = Math.min(this.start ?? last, last)
    const at = (index: number) => origin + index * this.step

    if (child.isForward) {
      const first = child.start ?? 0
      if (first >= length) return Slice.empty

      const end = at(Math.min(child.stop ?? length, length))

      return new Slice(at(first), end >= 0 ? end : undefined, step)
    }

    const first = Math.min(child.start ?? length - 1, length - 1)

    if (child.stop === undefined) return new Slice(at(first), origin + 1, step)
    if (child.stop >= first) return Slice.empty

    return new Slice(at(first), at(child.stop), step)
  }

  equals(other: Slice): boolean {
    return this.start === other.start && this.stop === other.stop && this.step === other.step
  }

  toString(): string {
    const start = this.start ?? ""
    const stop = this.stop ?? ""

    return this.step === 1 ? `[${start}:${stop}]` : `[${start}:${stop}:${this.step}]`
  }
}
