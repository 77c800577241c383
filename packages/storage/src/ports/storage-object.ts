import type { Readable } from "node:stream"

export type StorageData = Readable | Buffer | Uint8Array

export type Bytes = number

/**
 * Path-like identifier of an object within a bucket ("reports/2024/q1.csv").
 * A trailing "/" marks a directory prefix for the Bucket operations that accept one.
 */
export type StorageKey = string

export type StorageBucket = string

export interface ObjectRef {
  bucket: StorageBucket
  key: StorageKey
}

export type Metadata = {
  contentType?: string
  metadata?: Record<string, string>
  etag?: string
}

/**
 * Returned by head() and list(). Providers may omit user metadata from listings.
 */
export type StorageObjectMetadata = Metadata & {
  key: StorageKey
  sizeInBytes: Bytes
  lastModified: Date
}

export interface StorageObject extends StorageObjectMetadata {
  body: Readable
}
