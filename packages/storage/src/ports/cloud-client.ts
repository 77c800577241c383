import type { Bucket, CloudProvider, DownloadOptions, UploadOptions } from "./bucket"
import type { StorageBucket } from "./storage-object"

export interface CloudClient {
  readonly provider: CloudProvider

  /** Handle without a remote call. Operations fail later if the bucket is missing. */
  bucket(name: StorageBucket): Bucket

  /** Throws NotFoundError when the bucket does not exist. */
  getBucket(name: StorageBucket): Promise<Bucket>

  listBuckets(): Promise<StorageBucket[]>

  /** `bucketPath` is "bucket-name/object/path". */
  upload(localPath: string, bucketPath: string, options?: UploadOptions): Promise<void>

  download(bucketPath: string, localPath: string, options?: DownloadOptions): Promise<void>

  /** Release the SDK transport. The client is unusable afterwards. */
  close(): Promise<void>
}
