import { InvalidIndexError, InvalidStepError } from "../errors"

export function assertInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidIndexError(name, value)
  }
}

export function assertOptionalInteger(value: number | undefined, name: string): void {
  if (value !== undefined) assertInteger(value, name)
}

export function assertValidStep(step: number): void {
  assertInteger(step, "step")

  if (step === 0) {
    throw new InvalidStepError(step)
  }
}
