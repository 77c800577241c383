import type {
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "./storage-object"
import type { ListOptions, PutOptions } from "./storage-options"
import type { ListResult } from "./storage-result"

/**
 * Provider adapter contract. Implementations translate SDK failures into
 * `StorageError` subclasses and never retry.
 */
export interface StoragePort {
  /** Upload an object. Overwrites if it exists. */
  put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void>

  /** Object metadata without body, or null if not found. */
  head(ref: ObjectRef): Promise<StorageObjectMetadata | null>

  exists(ref: ObjectRef): Promise<boolean>

  /** Object with body, or null if not found. */
  get(ref: ObjectRef): Promise<StorageObject | null>

  /** No-op if not found. */
  delete(ref: ObjectRef): Promise<void>

  /** Skips missing keys. */
  deleteMany(bucket: StorageBucket, keys: StorageKey[]): Promise<void>

  list(bucket: StorageBucket, options?: ListOptions): Promise<ListResult>

  /** Throws NotFoundError when `src` does not exist. */
  copy(src: ObjectRef, dst: ObjectRef): Promise<void>

  bucketExists(bucket: StorageBucket): Promise<boolean>

  listBuckets(): Promise<StorageBucket[]>
}
