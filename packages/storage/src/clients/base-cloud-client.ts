import { createNullLogger, type Logger } from "@cloudbucket/logger"
import { parseBucketPath } from "../core/bucket-path"
import { logOperation } from "../core/log-operation"
import { ObjectBucket } from "../core/object-bucket"
import { InvalidPathError, NotFoundError } from "../core/storage-errors"
import type { Bucket, CloudProvider, DownloadOptions, UploadOptions } from "../ports/bucket"
import type { CloudClient } from "../ports/cloud-client"
import type { StoragePort } from "../ports/storage"
import type { ObjectRef, StorageBucket } from "../ports/storage-object"

export interface CloudClientDeps {
  /** Defaults to a logger that discards everything. */
  logger?: Logger
}

export abstract class BaseCloudClient implements CloudClient {
  protected readonly logger: Logger

  protected constructor(
    readonly provider: CloudProvider,
    protected readonly storage: StoragePort,
    deps: CloudClientDeps,
  ) {
    this.logger = (deps.logger ?? createNullLogger()).child({ provider })
  }

  bucket(name: StorageBucket): Bucket {
    if (!name.trim()) throw InvalidPathError.blankKey("bucket")

    return new ObjectBucket(name, this.provider, {
      storage: this.storage,
      logger: this.logger,
    })
  }

  getBucket(name: StorageBucket): Promise<Bucket> {
    return logOperation(this.logger, "getBucket", name, { bucket: name }, async () => {
      const bucket = this.bucket(name)

      if (!(await this.storage.bucketExists(name))) throw NotFoundError.bucket(name)

      return bucket
    })
  }

  listBuckets(): Promise<StorageBucket[]> {
    return logOperation(this.logger, "listBuckets", "", {}, () => this.storage.listBuckets())
  }

  async upload(localPath: string, bucketPath: string, options?: UploadOptions): Promise<void> {
    const { bucket, key } = this.parsePath("upload", bucketPath)
    await this.bucket(bucket).upload(localPath, key, options)
  }

  async download(bucketPath: string, localPath: string, options?: DownloadOptions): Promise<void> {
    const { bucket, key } = this.parsePath("download", bucketPath)
    await this.bucket(bucket).download(key, localPath, options)
  }

  async close(): Promise<void> {}

  private parsePath(operation: string, bucketPath: string): ObjectRef {
    try {
      return parseBucketPath(bucketPath)
    } catch (err) {
      this.logger.error(`${operation} failed`, { operation, key: bucketPath, err })
      throw err
    }
  }
}
