export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: source paths, line numbers,
 * flag names. Never interpolate these into the message alone.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same operation later might succeed (e.g. a flaky fetch). */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad config text, unreachable source),
   * `false` for misuse of the API (parsing twice, registering after parse).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by log serializers.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
