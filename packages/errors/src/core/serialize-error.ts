import type { SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value to a {@link SerializedError}, following the
 * `cause` chain.
 *
 * Errors that are not {@link AppError}s get the code `"unknown"` and are
 * marked non-operational; non-error values are wrapped and kept under
 * `context.value`.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isOperational: false,
    }
  }

  const app = isAppError(err) ? err : undefined

  return {
    name: err.name,
    code: app?.code ?? "unknown",
    message: err.message,
    context: { ...app?.context },
    isOperational: app?.isOperational ?? false,
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options.includeStack && err.stack !== undefined && { stack: err.stack }),
  }
}
