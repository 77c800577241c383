import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode>
  extends Error
  implements AppError
{
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...(options.context ?? {}) })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean

  /** Stop following `cause` after this many levels. Default: 10 */
  maxDepth?: number
}>

/**
 * Serialize any thrown value to a consistent, JSON-safe shape.
 *
 * BaseError keeps its code and context. Plain errors get code "unknown" and are
 * marked non-operational. Non-error values end up in `context.value`.
 */
export function serializeError(
  err: unknown,
  options?: SerializeOptions,
  depth: number = 0,
): SerializedError {
  const includeStack = options?.includeStack ?? false
  const maxDepth = options?.maxDepth ?? 10

  const serializeCause = (cause: unknown) =>
    cause !== undefined && depth < maxDepth
      ? { cause: serializeError(cause, options, depth + 1) }
      : {}

  if (err instanceof BaseError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      timestamp: err.timestamp.toISOString(),
      isRetryable: err.isRetryable,
      isOperational: err.isOperational,
      ...serializeCause(err.cause),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: readErrorCode(err) ?? "unknown",
      message: err.message,
      context: {},
      timestamp: new Date().toISOString(),
      isRetryable: false,
      isOperational: false,
      ...serializeCause(err.cause),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    timestamp: new Date().toISOString(),
    isRetryable: false,
    isOperational: false,
  }
}

// Node system errors ("ENOENT") and some SDK errors carry a string `code`.
function readErrorCode(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, "code")
  return typeof code === "string" ? code : undefined
}
