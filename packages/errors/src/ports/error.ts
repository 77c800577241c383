export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error: bucket names, keys, local paths.
 * Kept separate from the message so log processors can index it.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same call might succeed (throttling, 5xx) */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (missing object, rejected credentials),
   * `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * The provider SDK error or filesystem error this one wraps.
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape used in log lines.
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
