export type ErrorCode = Lowercase<string>

/**
 * Structured values attached to an error, such as the offending index
 * or the bounds that were in effect.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for failures a caller is expected to handle (bad arguments, an
   * index past the end), `false` for broken invariants inside the library.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
