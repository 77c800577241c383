import type { ObjectRef } from "../ports/storage-object"
import { InvalidPathError } from "./storage-errors"

/**
 * Split "bucket-name/object/path" at the first "/".
 *
 * @example
 * parseBucketPath("media/photos/cat.png") // { bucket: "media", key: "photos/cat.png" }
 */
export function parseBucketPath(path: string): ObjectRef {
  const slash = path.indexOf("/")
  if (slash <= 0 || slash === path.length - 1) {
    throw InvalidPathError.bucketPath(path)
  }

  return { bucket: path.slice(0, slash), key: path.slice(slash + 1) }
}

export function isDirectoryKey(key: string): boolean {
  return key.endsWith("/")
}

/** "a/b" and "a/b/" both become "a/b/". "" stays "". */
export function toDirectoryKey(key: string): string {
  if (!key) return key
  return key.endsWith("/") ? key : `${key}/`
}
