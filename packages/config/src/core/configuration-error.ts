import { BaseError, type ErrorContext } from "@wid/errors"

/**
 * Raised when settings are missing, malformed or cannot be read.
 */
export class ConfigurationError extends BaseError<"configuration"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, { code: "configuration", ...options })
  }
}
