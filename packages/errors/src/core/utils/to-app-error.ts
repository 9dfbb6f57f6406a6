import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * Normalize a caught value into an AppError.
 *
 * - BaseError instances pass through untouched
 * - other Errors are wrapped (kept as `cause`) and marked non-operational
 * - anything else is wrapped with the raw value in `context.value`
 *
 * @param fallbackCode - code for values that are not already a BaseError
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (err instanceof BaseError) return err

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
    })
  }

  if (typeof err === "string") {
    return new BaseError(err, { code: fallbackCode, isOperational: false })
  }

  return new BaseError("Unknown error", {
    code: fallbackCode,
    context: { value: err },
    isOperational: false,
  })
}
