import {
  describeSlice,
  range,
  referenceSlice,
  type SliceArgs,
  sliceGrid,
} from "../../../test-utils/reference-slice"
import { IndexOutOfRangeError, InvalidIndexError, InvalidStepError } from "../../errors"
import { Slice, type SizeOf } from "../slice"

function sizeOf(length: number): SizeOf {
  return () => length
}

function select<T>(slice: Slice, items: readonly T[]): T[] {
  const size = sizeOf(items.length)

  return range(slice.length(size)).map((i) => items[slice.resolve(i, size)])
}

describe("Slice", () => {
  describe("construction", () => {
    it("defaults step to 1 and leaves bounds open", () => {
      const slice = Slice.of()

      expect(slice.start).toBeUndefined()
      expect(slice.stop).toBeUndefined()
      expect(slice.step).toBe(1)
    })

    it("throws InvalidStepError for a zero step", () => {
      expect(() => Slice.of(0, 10, 0)).toThrow(InvalidStepError)
      expect(() => Slice.of(0, 10, 0)).toThrow("slice step cannot be zero")
    })

    it.each([
      [1.5, undefined, 1],
      [undefined, Number.NaN, 1],
      [undefined, undefined, Number.POSITIVE_INFINITY],
    ] satisfies SliceArgs[])("rejects non-integer arguments %s %s %s", (start, stop, step) => {
      expect(() => Slice.of(start, stop, step)).toThrow(InvalidIndexError)
    })

    it("is frozen", () => {
      expect(Object.isFrozen(Slice.of(1, 2, 3))).toBe(true)
    })
  })

  describe("isForward", () => {
    it.each([
      [Slice.identity, true],
      [Slice.of(5, 1, 2), true],
      [Slice.of(undefined, undefined, -1), false],
    ])("%s -> %s", (slice, expected) => {
      expect(slice.isForward).toBe(expected)
    })
  })

  describe("hasNegativeBounds", () => {
    it.each([
      [Slice.of(-1), true],
      [Slice.of(undefined, -1), true],
      [Slice.of(0, 5, -1), false],
      [Slice.identity, false],
    ])("%s -> %s", (slice, expected) => {
      expect(slice.hasNegativeBounds()).toBe(expected)
    })
  })

  describe("positive", () => {
    it("returns itself without asking for the size when bounds are non-negative", () => {
      const size = vi.fn(sizeOf(10))
      const slice = Slice.of(2, 8, -1)

      expect(slice.positive(size)).toBe(slice)
      expect(size).not.toHaveBeenCalled()
    })

    it("resolves negative bounds against the size", () => {
      expect(Slice.of(-3, -1).positive(sizeOf(10)).toString()).toBe("[7:9]")
    })

    it("clamps a start before the first item to 0 going forwards", () => {
      expect(Slice.of(-20).positive(sizeOf(10)).toString()).toBe("[0:]")
    })

    it("clamps a stop before the first item to 0 going forwards", () => {
      expect(Slice.of(undefined, -20).positive(sizeOf(10)).toString()).toBe("[:0]")
    })

    it("opens a stop before the first item going backwards", () => {
      expect(Slice.of(5, -20, -1).positive(sizeOf(10)).toString()).toBe("[5::-1]")
    })

    it("empties a backward slice that starts before the first item", () => {
      const slice = Slice.of(-20, undefined, -1).positive(sizeOf(10))

      expect(slice.toString()).toBe("[0:0:-1]")
      expect(slice.length(sizeOf(10))).toBe(0)
    })
  })

  describe("length", () => {
    it.each([
      [Slice.of(10), 100, 90],
      [Slice.of(1000), 100, 0],
      [Slice.of(-10), 100, 10],
      [Slice.of(undefined, 1000), 100, 100],
      [Slice.of(5, 9), 10, 4],
      [Slice.of(9, 5), 10, 0],
      [Slice.of(undefined, undefined, 3), 10, 4],
      [Slice.of(undefined, undefined, 11), 10, 1],
      [Slice.of(3, undefined, -1), 10, 4],
      [Slice.of(undefined, 1, -1), 10, 8],
      [Slice.of(undefined, undefined, -4), 10, 3],
      [Slice.identity, 0, 0],
      [Slice.of(undefined, undefined, -1), 0, 0],
    ])("%s of %i items -> %i", (slice, size, expected) => {
      expect(slice.length(sizeOf(size))).toBe(expected)
    })
  })

  describe("reverse", () => {
    it("maps a backward slice onto the reversed items", () => {
      expect(Slice.of(3, undefined, -1).reverse(sizeOf(10)).toString()).toBe("[6:10]")
      expect(Slice.of(undefined, 1, -1).reverse(sizeOf(10)).toString()).toBe("[0:8]")
      expect(Slice.of(undefined, undefined, -2).reverse(sizeOf(10)).toString()).toBe("[0:10:2]")
    })

    it("clips a start past the end to the last item", () => {
      expect(Slice.of(15, undefined, -1).reverse(sizeOf(10)).toString()).toBe("[0:10]")
    })

    it("returns a forward slice unchanged", () => {
      const slice = Slice.of(1, 4)

      expect(slice.reverse(sizeOf(10))).toBe(slice)
    })
  })

  describe("resolve", () => {
    it("maps forward indices without asking for the size", () => {
      const size = vi.fn(sizeOf(100))
      const slice = Slice.of(2, 8, 3)

      expect(slice.resolve(0, size)).toBe(2)
      expect(slice.resolve(1, size)).toBe(5)
      expect(size).not.toHaveBeenCalled()
    })

    it("throws past a forward stop when strict", () => {
      expect(() => Slice.of(2, 8, 3).resolve(2, sizeOf(100))).toThrow(IndexOutOfRangeError)
    })

    it("clamps past a forward stop when not strict", () => {
      expect(Slice.of(2, 8, 3).resolve(2, sizeOf(100), { strict: false })).toBe(7)
      expect(Slice.of(0, 0).resolve(0, sizeOf(100), { strict: false })).toBe(0)
    })

    it("walks backwards from the last item", () => {
      const slice = Slice.of(undefined, 2, -3)
      const size = sizeOf(10)

      expect([0, 1, 2].map((i) => slice.resolve(i, size))).toEqual([9, 6, 3])
    })

    it("throws at or below a backward stop when strict", () => {
      expect(() => Slice.of(undefined, 2, -3).resolve(3, sizeOf(10))).toThrow(
        IndexOutOfRangeError,
      )
      expect(() => Slice.of(undefined, undefined, -1).resolve(10, sizeOf(10))).toThrow(
        IndexOutOfRangeError,
      )
    })

    it("clamps below a backward stop when not strict", () => {
      expect(Slice.of(undefined, 2, -3).resolve(3, sizeOf(10), { strict: false })).toBe(3)
      expect(Slice.of(undefined, undefined, -1).resolve(10, sizeOf(10), { strict: false })).toBe(
        0,
      )
    })
  })

  describe("compose", () => {
    it("composes forward slices without asking for the size", () => {
      const size = vi.fn(sizeOf(100))

      const composed = Slice.of(2).compose(Slice.of(3, 5), size)

      expect(composed.toString()).toBe("[5:7]")
      expect(size).not.toHaveBeenCalled()
    })

    it("keeps the tighter of the two stops", () => {
      expect(Slice.of(0, 6).compose(Slice.of(2, 100), sizeOf(10)).toString()).toBe("[2:6]")
    })

    it("multiplies steps", () => {
      expect(Slice.of(1, undefined, 2).compose(Slice.of(0, undefined, 3), sizeOf(20)).step).toBe(
        6,
      )
    })

    it("leaves the stop open when reversing a slice that starts at 0", () => {
      const composed = Slice.of(0, 5).compose(Slice.of(undefined, undefined, -1), sizeOf(10))

      expect(composed.toString()).toBe("[4::-1]")
    })

    it("stops just before the outer start when reversing a later slice", () => {
      const composed = Slice.of(3, 8).compose(Slice.of(undefined, undefined, -1), sizeOf(10))

      expect(composed.toString()).toBe("[7:2:-1]")
    })

    it("turns a reversed backward slice into a forward one", () => {
      const composed = Slice.of(undefined, undefined, -3).compose(
        Slice.of(undefined, undefined, -1),
        sizeOf(10),
      )

      expect(composed.toString()).toBe("[0:10:3]")
    })

    it("resolves negative child bounds against the outer length", () => {
      const composed = Slice.of(10, 20).compose(Slice.of(-2), sizeOf(100))

      expect(composed.toString()).toBe("[18:20]")
    })

    it("returns the empty slice when a backward child selects nothing", () => {
      const composed = Slice.of(undefined, undefined, -1).compose(Slice.of(2, 5, -1), sizeOf(10))

      expect(composed).toBe(Slice.empty)
    })
  })

  describe("equals and toString", () => {
    it("compares bounds and step", () => {
      expect(Slice.of(1, 5, 2).equals(Slice.of(1, 5, 2))).toBe(true)
      expect(Slice.of(1, 5, 2).equals(Slice.of(1, 5))).toBe(false)
    })

    it("renders like a slice expression", () => {
      expect(Slice.identity.toString()).toBe("[:]")
      expect(Slice.of(undefined, undefined, -1).toString()).toBe("[::-1]")
      expect(Slice.of(2, 9, 3).toString()).toBe("[2:9:3]")
    })
  })

  describe("matches dynamic-array slicing", () => {
    const bounds = [undefined, -12, -5, -1, 0, 1, 3, 6, 12]
    const steps = [-3, -2, -1, 1, 2, 3]

    for (const length of [0, 1, 6, 9]) {
      const items = range(length).map((i) => i * 10)

      it(`selects the same items from ${length} items`, () => {
        for (const args of sliceGrid(bounds, steps)) {
          expect(select(Slice.of(...args), items), describeSlice(args)).toEqual(
            referenceSlice(items, ...args),
          )
        }
      })
    }

    it("composes into a slice selecting the same items as slicing twice", () => {
      const items = range(9)
      const size = sizeOf(items.length)
      const grid = sliceGrid([undefined, -4, -1, 0, 2, 7], [-2, -1, 1, 2])

      for (const outer of grid) {
        const once = referenceSlice(items, ...outer)

        for (const child of grid) {
          const composed = Slice.of(...outer).compose(Slice.of(...child), size)

          expect(select(composed, items), `${describeSlice(outer)}${describeSlice(child)}`).toEqual(
            referenceSlice(once, ...child),
          )
        }
      }
    })
  })
})
