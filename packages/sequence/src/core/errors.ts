import { BaseError } from "@lazyslice/errors"

export class InvalidStepError extends BaseError<"invalid_step"> {
  constructor(step: number) {
    super("slice step cannot be zero", {
      code: "invalid_step",
      context: { step },
    })
  }
}

export type IndexOutOfRangeContext = {
  index: number
  /** Absolute producer position, when the index got that far. */
  position?: number
  length?: number
}

export class IndexOutOfRangeError extends BaseError<"index_out_of_range"> {
  constructor(context: IndexOutOfRangeContext) {
    super("lazy sequence index out of range", {
      code: "index_out_of_range",
      context,
    })
  }
}

export class InvalidIndexError extends BaseError<"invalid_index"> {
  constructor(name: string, value: unknown) {
    super(`${name} must be an integer, got: ${String(value)}`, {
      code: "invalid_index",
      context: { name, value },
    })
  }
}

export function isIndexOutOfRangeError(err: unknown): err is IndexOutOfRangeError {
  return err instanceof IndexOutOfRangeError
}
