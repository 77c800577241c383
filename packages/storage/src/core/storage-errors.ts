import { BaseError, type ErrorContext } from "@cloudbucket/errors"
import type { ObjectRef, StorageBucket } from "../ports/storage-object"

export type StorageErrorCode =
  | "authentication_failed"
  | "not_found"
  | "io_error"
  | "transfer_failed"
  | "already_exists"
  | "invalid_path"

/**
 * Base class for everything a client or bucket throws, so callers can
 * `catch (err) { if (err instanceof StorageError) ... }` once.
 */
export class StorageError<C extends StorageErrorCode = StorageErrorCode> extends BaseError<C> {}

export class AuthenticationError extends StorageError<"authentication_failed"> {
  static missingCredentials(provider: string, missing: string[]): AuthenticationError {
    return new AuthenticationError(
      `Missing ${provider} credentials: ${missing.join(", ")}`,
      { code: "authentication_failed", context: { provider, missing } },
    )
  }

  static invalidKeyFile(path: string, cause: unknown): AuthenticationError {
    return new AuthenticationError(`Invalid service account key file: ${path}`, {
      code: "authentication_failed",
      context: { path },
      cause,
    })
  }

  static invalidKey(reason: string, cause?: unknown): AuthenticationError {
    return new AuthenticationError(`Invalid service account key: ${reason}`, {
      code: "authentication_failed",
      ...(cause !== undefined && { cause }),
    })
  }

  static rejected(provider: string, context: ErrorContext, cause: unknown): AuthenticationError {
    return new AuthenticationError(`${provider} rejected the configured credentials`, {
      code: "authentication_failed",
      context: { provider, ...context },
      cause,
    })
  }
}

export class NotFoundError extends StorageError<"not_found"> {
  static object(ref: ObjectRef): NotFoundError {
    return new NotFoundError(`Object not found: ${ref.bucket}/${ref.key}`, {
      code: "not_found",
      context: { bucket: ref.bucket, key: ref.key },
    })
  }

  static prefix(ref: ObjectRef): NotFoundError {
    return new NotFoundError(`No objects under prefix: ${ref.bucket}/${ref.key}`, {
      code: "not_found",
      context: { bucket: ref.bucket, prefix: ref.key },
    })
  }

  static bucket(bucket: StorageBucket, cause?: unknown): NotFoundError {
    return new NotFoundError(`Bucket not found: ${bucket}`, {
      code: "not_found",
      context: { bucket },
      ...(cause !== undefined && { cause }),
    })
  }

  /** The provider reported a missing object or bucket during `operation`. */
  static fromProvider(operation: string, context: ErrorContext, cause: unknown): NotFoundError {
    return new NotFoundError(`Not found during ${operation}`, {
      code: "not_found",
      context: { operation, ...context },
      cause,
    })
  }
}

export class IOError extends StorageError<"io_error"> {
  static localPathMissing(path: string, cause?: unknown): IOError {
    return new IOError(`Local path does not exist: ${path}`, {
      code: "io_error",
      context: { path },
      ...(cause !== undefined && { cause }),
    })
  }

  static emptyDirectory(path: string): IOError {
    return new IOError(`Directory contains no files: ${path}`, {
      code: "io_error",
      context: { path },
    })
  }

  /** A remote key would land outside the download directory. */
  static outsideTarget(path: string, key: string): IOError {
    return new IOError(`Key ${key} resolves outside ${path}`, {
      code: "io_error",
      context: { path, key },
    })
  }

  static read(path: string, cause: unknown): IOError {
    return new IOError(`Failed to read local file: ${path}`, {
      code: "io_error",
      context: { path },
      cause,
    })
  }

  static write(path: string, cause: unknown): IOError {
    return new IOError(`Failed to write local file: ${path}`, {
      code: "io_error",
      context: { path },
      cause,
    })
  }
}

export class TransferError extends StorageError<"transfer_failed"> {
  static from(
    operation: string,
    context: ErrorContext,
    cause: unknown,
    isRetryable = false,
  ): TransferError {
    const reason = cause instanceof Error ? `: ${cause.message}` : ""

    return new TransferError(`${operation} failed${reason}`, {
      code: "transfer_failed",
      context: { operation, ...context },
      cause,
      isRetryable,
    })
  }

  /** Copy succeeded, delete did not: both keys now exist. */
  static partialRename(from: ObjectRef, toKey: string, cause: unknown): TransferError {
    return new TransferError(
      `Rename copied ${from.bucket}/${from.key} to ${toKey} but could not delete the source`,
      {
        code: "transfer_failed",
        context: { bucket: from.bucket, from: from.key, to: toKey, copied: true },
        cause,
      },
    )
  }
}

export class AlreadyExistsError extends StorageError<"already_exists"> {
  static remote(ref: ObjectRef): AlreadyExistsError {
    return new AlreadyExistsError(`Object already exists: ${ref.bucket}/${ref.key}`, {
      code: "already_exists",
      context: { bucket: ref.bucket, key: ref.key },
    })
  }

  static local(path: string): AlreadyExistsError {
    return new AlreadyExistsError(`Local file already exists: ${path}`, {
      code: "already_exists",
      context: { path },
    })
  }
}

export class InvalidPathError extends StorageError<"invalid_path"> {
  static bucketPath(path: string): InvalidPathError {
    return new InvalidPathError(`Expected "bucket-name/object/path", got "${path}"`, {
      code: "invalid_path",
      context: { path },
    })
  }

  static nestedRename(from: string, to: string): InvalidPathError {
    return new InvalidPathError(`Cannot rename "${from}" to "${to}": one prefix contains the other`, {
      code: "invalid_path",
      context: { from, to },
    })
  }

  static blankKey(operation: string): InvalidPathError {
    return new InvalidPathError(`${operation} requires a non-empty key`, {
      code: "invalid_path",
      context: { operation },
    })
  }
}
