export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (addresses, trust domains, ids).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the operation later might succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad address, endpoint down, source
   * closed), `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used in log payloads.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
