/**
 * Clip slice bounds against `length` the way dynamic-array slicing does.
 * For negative steps the stop may come out as -1, meaning "through the
 * first item".
 */
export function clipBounds(
  length: number,
  start: number | undefined,
  stop: number | undefined,
  step: number,
): [number, number] {
  const lower = step > 0 ? 0 : -1
  const upper = step > 0 ? length : length - 1

  const clip = (bound: number | undefined, fallback: number) => {
    if (bound === undefined) return fallback
    if (bound < 0) return Math.max(bound + length, lower)
    return Math.min(bound, upper)
  }

  return [clip(start, step > 0 ? lower : upper), clip(stop, step > 0 ? upper : lower)]
}

export function referenceSlice<T>(
  items: readonly T[],
  start?: number,
  stop?: number,
  step: number = 1,
): T[] {
  const [from, to] = clipBounds(items.length, start, stop, step)
  const out: T[] = []

  if (step > 0) {
    for (let i = from; i < to; i += step) out.push(items[i])
  } else {
    for (let i = from; i > to; i += step) out.push(items[i])
  }

  return out
}

export function referenceAt<T>(items: readonly T[], index: number): T | undefined {
  const position = index < 0 ? index + items.length : index

  return position >= 0 && position < items.length ? items[position] : undefined
}

export function range(length: number): number[] {
  return Array.from({ length }, (_, i) => i)
}

export type SliceArgs = [start: number | undefined, stop: number | undefined, step: number]

export function sliceGrid(bounds: readonly (number | undefined)[], steps: readonly number[]) {
  const grid: SliceArgs[] = []

  for (const start of bounds) {
    for (const stop of bounds) {
      for (const step of steps) grid.push([start, stop, step])
    }
  }

  return grid
}

export function describeSlice([start, stop, step]: SliceArgs): string {
  return `[${start ?? ""}:${stop ?? ""}:${step}]`
}
