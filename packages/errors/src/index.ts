export { BaseError, type BaseErrorOptions, serializeError, type SerializeOptions } from "./core/base-error"
export { err, ok } from "./core/result"
export { toAppError } from "./core/utils/to-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
export type { Err, Ok, Result } from "./ports/result"
