import type { ErrorContext } from "@cloudbucket/errors"
import {
  AuthenticationError,
  NotFoundError,
  type StorageError,
  TransferError,
} from "../core/storage-errors"

const NOT_FOUND_NAMES = new Set(["NotFound", "NoSuchKey", "NoSuchBucket"])

const AUTH_NAMES = new Set([
  "InvalidAccessKeyId",
  "SignatureDoesNotMatch",
  "ExpiredToken",
  "InvalidToken",
  "CredentialsProviderError",
])

const THROTTLE_NAMES = new Set(["SlowDown", "Throttling", "ThrottlingException", "RequestTimeout"])

export function isS3NotFound(err: unknown): boolean {
  return err instanceof Error && NOT_FOUND_NAMES.has(err.name)
}

/**
 * Map an S3 SDK failure onto the storage taxonomy. The SDK error stays as `cause`.
 */
export function toS3StorageError(
  operation: string,
  context: ErrorContext,
  err: unknown,
): StorageError {
  const name = err instanceof Error ? err.name : undefined
  const status = httpStatusOf(err)

  if (name && NOT_FOUND_NAMES.has(name)) {
    return NotFoundError.fromProvider(operation, context, err)
  }

  if ((name && AUTH_NAMES.has(name)) || status === 401) {
    return AuthenticationError.rejected("s3", context, err)
  }

  const retryable =
    (name !== undefined && THROTTLE_NAMES.has(name)) ||
    status === 429 ||
    (status !== undefined && status >= 500)

  return TransferError.from(operation, context, err, retryable)
}

// SDK v3 service exceptions carry `$metadata.httpStatusCode`.
function httpStatusOf(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined

  const metadata: unknown = Reflect.get(err, "$metadata")
  if (!metadata || typeof metadata !== "object") return undefined

  const status: unknown = Reflect.get(metadata, "httpStatusCode")
  return typeof status === "number" ? status : undefined
}
