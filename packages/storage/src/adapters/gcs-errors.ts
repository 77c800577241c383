import type { ErrorContext } from "@cloudbucket/errors"
import {
  AuthenticationError,
  NotFoundError,
  type StorageError,
  TransferError,
} from "../core/storage-errors"

export function isGcsNotFound(err: unknown): boolean {
  const code = errorCodeOf(err)
  return code === 404 || code === "ENOENT"
}

/**
 * Map a `@google-cloud/storage` failure (an ApiError or a google-auth error)
 * onto the storage taxonomy.
 */
export function toGcsStorageError(
  operation: string,
  context: ErrorContext,
  err: unknown,
): StorageError {
  if (isGcsNotFound(err)) {
    return NotFoundError.fromProvider(operation, context, err)
  }

  const code = errorCodeOf(err)

  if (code === 401 || isInvalidGrant(err)) {
    return AuthenticationError.rejected("gcs", context, err)
  }

  const retryable = typeof code === "number" && (code === 429 || code >= 500)

  return TransferError.from(operation, context, err, retryable)
}

function errorCodeOf(err: unknown): unknown {
  if (!err || typeof err !== "object") return undefined
  return Reflect.get(err, "code")
}

// google-auth-library surfaces a refused service account as "invalid_grant".
function isInvalidGrant(err: unknown): boolean {
  return err instanceof Error && err.message.includes("invalid_grant")
}
