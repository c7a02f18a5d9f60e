export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export { toAppError } from "./core/utils/to-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
