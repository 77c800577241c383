import { createHash } from "node:crypto"
import { Readable } from "node:stream"
import {
  CopyObjectCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
} from "@aws-sdk/client-s3"
import { readBody } from "./read-body"

type FakeObject = {
  body: Buffer
  contentType?: string
  metadata?: Record<string, string>
  lastModified: Date
}

export function s3ServiceError(name: string, httpStatusCode: number): Error {
  return Object.assign(new Error(name), { name, $metadata: { httpStatusCode } })
}

/**
 * In-process stand-in for S3Client. Understands the commands S3Storage sends
 * and records each one in `commands`.
 */
export class FakeS3Client {
  readonly buckets = new Map<string, Map<string, FakeObject>>()
  readonly commands: unknown[] = []
  destroyed = false

  constructor(buckets: string[] = []) {
    for (const bucket of buckets) this.buckets.set(bucket, new Map())
  }

  /** Raw keys as stored, keyspace prefix included. */
  rawKeys(bucket: string): string[] {
    return [...(this.buckets.get(bucket)?.keys() ?? [])].sort()
  }

  destroy(): void {
    this.destroyed = true
  }

  async send(command: unknown): Promise<unknown> {
    this.commands.push(command)

    if (command instanceof PutObjectCommand) {
      const { Bucket, Key, Body, ContentType, Metadata } = command.input
      if (!(Body instanceof Readable || Body instanceof Uint8Array || typeof Body === "string")) {
        throw new Error("FakeS3Client only accepts Buffer, Uint8Array, string or Readable bodies")
      }

      this.bucket(Bucket).set(this.key(Key), {
        body: await readBody(Body),
        lastModified: new Date(),
        ...(ContentType && { contentType: ContentType }),
        ...(Metadata && { metadata: { ...Metadata } }),
      })
      return {}
    }

    if (command instanceof HeadObjectCommand) {
      const object = this.object(command.input.Bucket, command.input.Key, "NotFound")
      return this.describe(object)
    }

    if (command instanceof GetObjectCommand) {
      const object = this.object(command.input.Bucket, command.input.Key, "NoSuchKey")
      return { ...this.describe(object), Body: Readable.from([Buffer.from(object.body)]) }
    }

    if (command instanceof DeleteObjectCommand) {
      this.bucket(command.input.Bucket).delete(this.key(command.input.Key))
      return {}
    }

    if (command instanceof DeleteObjectsCommand) {
      const bucket = this.bucket(command.input.Bucket)
      for (const { Key } of command.input.Delete?.Objects ?? []) {
        bucket.delete(this.key(Key))
      }
      return { Errors: [] }
    }

    if (command instanceof ListObjectsV2Command) {
      return this.list(command)
    }

    if (command instanceof CopyObjectCommand) {
      const source = decodeURIComponent(command.input.CopySource ?? "")
      const slash = source.indexOf("/")
      const object = this.object(source.slice(0, slash), source.slice(slash + 1), "NoSuchKey")

      this.bucket(command.input.Bucket).set(this.key(command.input.Key), {
        ...object,
        body: Buffer.from(object.body),
        lastModified: new Date(),
      })
      return {}
    }

    if (command instanceof HeadBucketCommand) {
      if (!this.buckets.has(command.input.Bucket ?? "")) throw s3ServiceError("NotFound", 404)
      return {}
    }

    if (command instanceof ListBucketsCommand) {
      return { Buckets: [...this.buckets.keys()].map((Name) => ({ Name })) }
    }

    throw new Error("FakeS3Client: unsupported command")
  }

  private list(command: ListObjectsV2Command) {
    const { Bucket, Prefix = "", MaxKeys = 1000, ContinuationToken } = command.input

    const keys = [...this.bucket(Bucket).keys()]
      .filter((key) => key.startsWith(Prefix))
      .filter((key) => !ContinuationToken || key > ContinuationToken)
      .sort()

    const page = keys.slice(0, MaxKeys)
    const last = page.at(-1)

    return {
      Contents: page.map((Key) => {
        const object = this.object(Bucket, Key, "NoSuchKey")
        return {
          Key,
          Size: object.body.length,
          LastModified: object.lastModified,
          ETag: this.etag(object.body),
        }
      }),
      ...(keys.length > MaxKeys && last && { NextContinuationToken: last }),
    }
  }

  private describe(object: FakeObject) {
    return {
      ContentLength: object.body.length,
      LastModified: object.lastModified,
      ETag: this.etag(object.body),
      ...(object.contentType && { ContentType: object.contentType }),
      ...(object.metadata && { Metadata: { ...object.metadata } }),
    }
  }

  private bucket(name: string | undefined): Map<string, FakeObject> {
    const bucket = this.buckets.get(name ?? "")
    if (!bucket) throw s3ServiceError("NoSuchBucket", 404)
    return bucket
  }

  private object(bucket: string | undefined, key: string | undefined, missing: string): FakeObject {
    const object = this.bucket(bucket).get(this.key(key))
    if (!object) throw s3ServiceError(missing, 404)
    return object
  }

  private key(key: string | undefined): string {
    if (!key) throw s3ServiceError("InvalidArgument", 400)
    return key
  }

  private etag(body: Buffer): string {
    return `"${createHash("md5").update(body).digest("hex")}"`
  }
}
