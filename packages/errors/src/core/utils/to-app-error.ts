import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * Normalize a caught value into an AppError.
 *
 * - BaseError passes through unchanged
 * - Error instances are wrapped as non-operational, keeping the original as `cause`
 * - Anything else is wrapped with the raw value in `context.value`
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (err instanceof BaseError) {
    return err
  }

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}
