import type { StorageKey, StorageObjectMetadata } from "./storage-object"

export type CloudProvider = "s3" | "gcs" | "memory"

export interface UploadOptions {
  /** Replace an existing remote object. Default: true */
  overwrite?: boolean
  contentType?: string
}

export interface DownloadOptions {
  /** Replace an existing local file. Default: true */
  overwrite?: boolean
}

export interface RenameOptions {
  /** Replace an existing destination object. Default: false */
  overwrite?: boolean
}

export interface BucketListOptions {
  prefix?: string

  /** fnmatch-style glob matched against the whole key */
  pattern?: string

  /** Cap on keys returned, applied after `pattern` */
  maxResults?: number
}

export interface SearchOptions {
  /** Restrict the search to keys under this directory */
  directory?: string
}

/**
 * Handle on one remote container. Keys ending in "/" address a directory
 * prefix for upload, download, delete and rename.
 */
export interface Bucket {
  readonly name: string
  readonly provider: CloudProvider

  /** Upload a local file, or every file beneath a local directory. */
  upload(localPath: string, key: StorageKey, options?: UploadOptions): Promise<void>

  /** Download an object, or every object under a "dir/" prefix. */
  download(key: StorageKey, localPath: string, options?: DownloadOptions): Promise<void>

  /** Throws NotFoundError when nothing exists at `key`. */
  delete(key: StorageKey): Promise<void>

  /**
   * Copy then delete. Not atomic: when the delete fails both keys remain and
   * the TransferError has `context.copied === true`.
   */
  rename(oldKey: StorageKey, newKey: StorageKey, options?: RenameOptions): Promise<void>

  /** Every key in the bucket (all pages), optionally filtered. */
  list(options?: BucketListOptions): Promise<StorageKey[]>

  search(pattern: string, options?: SearchOptions): Promise<StorageKey[]>

  exists(key: StorageKey): Promise<boolean>

  head(key: StorageKey): Promise<StorageObjectMetadata | null>
}
