import type { ErrorContext } from "@cloudbucket/errors"
import type { Logger } from "@cloudbucket/logger"
import { StorageError, TransferError } from "./storage-errors"

/**
 * Run one client or bucket operation: `debug` with its duration on success,
 * `error` with the translated error on failure. Anything that is not already
 * a StorageError becomes a TransferError.
 */
export async function logOperation<T>(
  logger: Logger,
  operation: string,
  key: string,
  context: ErrorContext,
  fn: () => Promise<T>,
): Promise<T> {
  const start = performance.now()

  try {
    const result = await fn()

    logger.debug(`${operation} ok`, {
      operation,
      key,
      durationMs: Math.round(performance.now() - start),
    })

    return result
  } catch (err) {
    const error =
      err instanceof StorageError ? err : TransferError.from(operation, context, err)

    logger.error(`${operation} failed`, { operation, key, err: error })
    throw error
  }
}
