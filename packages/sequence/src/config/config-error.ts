import { BaseError, type ErrorContext } from "@lazyslice/errors"

export type ConfigIssue = { path: string; message: string }

export type ConfigErrorContext = ErrorContext & {
  issues: ConfigIssue[]
}

export class ConfigError extends BaseError<"config_invalid"> {
  declare readonly context: ConfigErrorContext

  constructor(message: string, issues: ConfigIssue[]) {
    super(message, { code: "config_invalid", context: { issues } })
  }
}
