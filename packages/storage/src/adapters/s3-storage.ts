import { Readable } from "node:stream"
import {
  type _Object,
  CopyObjectCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  type S3Client,
} from "@aws-sdk/client-s3"
import { Upload } from "@aws-sdk/lib-storage"
import { Keyspace } from "../core/keyspace"
import { TransferError } from "../core/storage-errors"
import type { StoragePort } from "../ports/storage"
import type {
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "../ports/storage-object"
import type { ListOptions, PutOptions } from "../ports/storage-options"
import type { ListResult } from "../ports/storage-result"
import { isS3NotFound, toS3StorageError } from "./s3-errors"

const S3_MAX_DELETE_BATCH_SIZE = 1000

export interface S3StorageDeps {
  client: S3Client
}

export interface S3StorageOptions {
  keyspacePrefix?: string
  deleteBatchSize?: number
}

export class S3Storage implements StoragePort {
  private readonly keyspace: Keyspace

  constructor(
    readonly deps: S3StorageDeps,
    readonly options: S3StorageOptions = {},
  ) {
    this.keyspace = new Keyspace(options.keyspacePrefix)
  }

  async put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const prefixedRef = this.keyspace.applyRef(ref)

    const upload = new Upload({
      client: this.deps.client,
      params: {
        Bucket: prefixedRef.bucket,
        Key: prefixedRef.key,
        Body: data,
        ...(options?.contentType && { ContentType: options.contentType }),
        ...(options?.metadata && { Metadata: options.metadata }),
      },
    })

    try {
      await upload.done()
    } catch (err) {
      throw toS3StorageError("put", { ...ref }, err)
    }
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    const prefixedRef = this.keyspace.applyRef(ref)

    try {
      const response = await this.deps.client.send(
        new HeadObjectCommand({ Bucket: prefixedRef.bucket, Key: prefixedRef.key }),
      )

      return this.toObjectMetadata(ref.key, response)
    } catch (err) {
      if (isS3NotFound(err)) return null
      throw toS3StorageError("head", { ...ref }, err)
    }
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    return (await this.head(ref)) !== null
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    const prefixedRef = this.keyspace.applyRef(ref)

    try {
      const response = await this.deps.client.send(
        new GetObjectCommand({ Bucket: prefixedRef.bucket, Key: prefixedRef.key }),
      )

      // Under Node the SDK hands back an IncomingMessage.
      if (!(response.Body instanceof Readable)) {
        throw TransferError.from("get", { ...ref, reason: "response has no stream body" }, undefined)
      }

      return {
        ...this.toObjectMetadata(ref.key, response),
        body: response.Body,
      }
    } catch (err) {
      if (err instanceof TransferError) throw err
      if (isS3NotFound(err)) return null
      throw toS3StorageError("get", { ...ref }, err)
    }
  }

  async delete(ref: ObjectRef): Promise<void> {
    const prefixedRef = this.keyspace.applyRef(ref)

    try {
      await this.deps.client.send(
        new DeleteObjectCommand({ Bucket: prefixedRef.bucket, Key: prefixedRef.key }),
      )
    } catch (err) {
      throw toS3StorageError("delete", { ...ref }, err)
    }
  }

  async deleteMany(bucket: StorageBucket, keys: StorageKey[]): Promise<void> {
    if (keys.length === 0) return

    const batchSize = Math.min(
      this.options.deleteBatchSize ?? S3_MAX_DELETE_BATCH_SIZE,
      S3_MAX_DELETE_BATCH_SIZE,
    )

    for (const batch of this.chunk(keys, batchSize)) {
      try {
        const response = await this.deps.client.send(
          new DeleteObjectsCommand({
            Bucket: bucket,
            Delete: {
              Objects: batch.map((key) => ({ Key: this.keyspace.apply(key) })),
              Quiet: true,
            },
          }),
        )

        // Per-key failures come back in the body, not as an exception.
        const failed = (response.Errors ?? []).filter((e) => e.Code !== "NoSuchKey")
        if (failed.length > 0) {
          throw TransferError.from(
            "deleteMany",
            {
              bucket,
              failedKeys: failed.map((e) => this.keyspace.strip(e.Key ?? "")),
              reason: failed[0]?.Message ?? failed[0]?.Code,
            },
            undefined,
          )
        }
      } catch (err) {
        if (err instanceof TransferError) throw err
        throw toS3StorageError("deleteMany", { bucket, keys: batch.length }, err)
      }
    }
  }

  async list(bucket: StorageBucket, options?: ListOptions): Promise<ListResult> {
    const prefix = this.keyspace.listPrefix(options?.prefix)

    try {
      const response = await this.deps.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          ...(prefix && { Prefix: prefix }),
          ...(options?.maxKeys && { MaxKeys: options.maxKeys }),
          ...(options?.cursor && { ContinuationToken: options.cursor }),
        }),
      )

      return {
        objects: this.mapListContents(response.Contents),
        ...(response.NextContinuationToken && { cursor: response.NextContinuationToken }),
      }
    } catch (err) {
      throw toS3StorageError("list", { bucket, prefix: options?.prefix ?? "" }, err)
    }
  }

  async copy(src: ObjectRef, dst: ObjectRef): Promise<void> {
    const prefixedSrc = this.keyspace.applyRef(src)
    const prefixedDst = this.keyspace.applyRef(dst)

    try {
      await this.deps.client.send(
        new CopyObjectCommand({
          Bucket: prefixedDst.bucket,
          Key: prefixedDst.key,
          CopySource: encodeURIComponent(`${prefixedSrc.bucket}/${prefixedSrc.key}`),
          MetadataDirective: "COPY",
        }),
      )
    } catch (err) {
      throw toS3StorageError(
        "copy",
        { bucket: src.bucket, from: src.key, to: `${dst.bucket}/${dst.key}` },
        err,
      )
    }
  }

  async bucketExists(bucket: StorageBucket): Promise<boolean> {
    try {
      await this.deps.client.send(new HeadBucketCommand({ Bucket: bucket }))
      return true
    } catch (err) {
      if (isS3NotFound(err)) return false
      throw toS3StorageError("bucketExists", { bucket }, err)
    }
  }

  async listBuckets(): Promise<StorageBucket[]> {
    try {
      const response = await this.deps.client.send(new ListBucketsCommand({}))

      return (response.Buckets ?? [])
        .map((b) => b.Name)
        .filter((name): name is string => Boolean(name))
    } catch (err) {
      throw toS3StorageError("listBuckets", {}, err)
    }
  }

  private toObjectMetadata(
    originalKey: string,
    response: {
      ContentLength?: number | undefined
      LastModified?: Date | undefined
      ETag?: string | undefined
      ContentType?: string | undefined
      Metadata?: Record<string, string> | undefined
    },
  ): StorageObjectMetadata {
    return {
      key: originalKey,
      sizeInBytes: response.ContentLength ?? 0,
      lastModified: response.LastModified ?? new Date(),
      ...(response.ETag && { etag: response.ETag }),
      ...(response.ContentType && { contentType: response.ContentType }),
      ...(response.Metadata && { metadata: response.Metadata }),
    }
  }

  private mapListContents(contents: _Object[] | undefined): StorageObjectMetadata[] {
    if (!contents) return []

    return contents
      .filter((obj): obj is _Object & { Key: string } => Boolean(obj.Key))
      .filter((obj) => this.keyspace.contains(obj.Key))
      .map((obj) => ({
        key: this.keyspace.strip(obj.Key),
        sizeInBytes: obj.Size ?? 0,
        lastModified: obj.LastModified ?? new Date(),
        ...(obj.ETag && { etag: obj.ETag }),
      }))
  }

  private chunk<T>(array: T[], size: number): T[][] {
    const chunks: T[][] = []
    for (let i = 0; i < array.length; i += size) {
      chunks.push(array.slice(i, i + size))
    }
    return chunks
  }
}
