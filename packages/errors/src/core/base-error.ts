import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"
import { serializeError } from "./serialize-error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  /** Default: false */
  isRetryable?: boolean
  /** Default: true */
  isOperational?: boolean
}>

/**
 * Base class for every error the workspace throws. Subclasses fix the code
 * and shape the context:
 *
 * ```ts
 * class InvalidStepError extends BaseError<"invalid_step"> {
 *   constructor(step: number) {
 *     super("slice step cannot be zero", { code: "invalid_step", context: { step } })
 *   }
 * }
 * ```
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean

  constructor(
    message: string,
    { code, context, cause, isRetryable, isOperational }: BaseErrorOptions<C>,
  ) {
    super(message, cause === undefined ? undefined : { cause })

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...context })
    this.isRetryable = isRetryable ?? false
    this.isOperational = isOperational ?? true

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}
