import { BaseError, type ErrorContext } from "@wid/errors"

export { ConfigurationError } from "@wid/config"

type SourceErrorOptions = { context?: ErrorContext; cause?: unknown }

/** The Workload API failed before the first update arrived. */
export class ConnectionError extends BaseError<"connection"> {
  constructor(message: string, options: SourceErrorOptions = {}) {
    super(message, { code: "connection", isRetryable: true, ...options })
  }
}

export class ClosedError extends BaseError<"closed"> {
  constructor(message = "source is closed") {
    super(message, { code: "closed" })
  }
}

export class NotFoundError extends BaseError<"not_found"> {
  constructor(message: string, options: SourceErrorOptions = {}) {
    super(message, { code: "not_found", ...options })
  }
}

/** No update or error arrived within the init timeout. */
export class TimeoutError extends BaseError<"timeout"> {
  constructor(message: string, options: SourceErrorOptions = {}) {
    super(message, { code: "timeout", isRetryable: true, ...options })
  }
}
