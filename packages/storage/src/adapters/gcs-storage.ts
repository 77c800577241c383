import { pipeline } from "node:stream/promises"
import type { File, Storage as GcsClient } from "@google-cloud/storage"
import { Keyspace } from "../core/keyspace"
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
import { isGcsNotFound, toGcsStorageError } from "./gcs-errors"

const DEFAULT_DELETE_BATCH_SIZE = 100

export interface GcsStorageDeps {
  client: GcsClient
}

export interface GcsStorageOptions {
  keyspacePrefix?: string
  deleteBatchSize?: number
}

export class GcsStorage implements StoragePort {
  private readonly keyspace: Keyspace

  constructor(
    private readonly deps: GcsStorageDeps,
    private readonly options: GcsStorageOptions = {},
  ) {
    this.keyspace = new Keyspace(options.keyspacePrefix)
  }

  async put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const file = this.getFile(ref)

    const uploadMetadata = {
      ...(options?.contentType && { contentType: options.contentType }),
      ...(options?.metadata && { metadata: { ...options.metadata } }),
    }

    try {
      if (Buffer.isBuffer(data) || data instanceof Uint8Array) {
        await file.save(Buffer.from(data), {
          resumable: false,
          ...(Object.keys(uploadMetadata).length > 0 && { metadata: uploadMetadata }),
        })
        return
      }

      await pipeline(
        data,
        file.createWriteStream({
          resumable: true,
          ...(Object.keys(uploadMetadata).length > 0 && { metadata: uploadMetadata }),
        }),
      )
    } catch (err) {
      throw toGcsStorageError("put", { ...ref }, err)
    }
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    const file = this.getFile(ref)

    try {
      const [metadata] = await file.getMetadata()
      return this.toObjectMetadata(ref.key, metadata)
    } catch (err) {
      if (isGcsNotFound(err)) return null
      throw toGcsStorageError("head", { ...ref }, err)
    }
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    try {
      const [exists] = await this.getFile(ref).exists()
      return exists
    } catch (err) {
      throw toGcsStorageError("exists", { ...ref }, err)
    }
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    const file = this.getFile(ref)

    try {
      const [metadata] = await file.getMetadata()

      return {
        ...this.toObjectMetadata(ref.key, metadata),
        body: file.createReadStream(),
      }
    } catch (err) {
      if (isGcsNotFound(err)) return null
      throw toGcsStorageError("get", { ...ref }, err)
    }
  }

  async delete(ref: ObjectRef): Promise<void> {
    try {
      await this.getFile(ref).delete()
    } catch (err) {
      if (!isGcsNotFound(err)) throw toGcsStorageError("delete", { ...ref }, err)
    }
  }

  async deleteMany(bucket: StorageBucket, keys: StorageKey[]): Promise<void> {
    if (keys.length === 0) return

    const bucketRef = this.deps.client.bucket(bucket)

    for (const batch of this.chunk(
      keys,
      this.options.deleteBatchSize ?? DEFAULT_DELETE_BATCH_SIZE,
    )) {
      await Promise.all(
        batch.map(async (key) => {
          try {
            await bucketRef.file(this.keyspace.apply(key)).delete()
          } catch (err) {
            if (!isGcsNotFound(err)) throw toGcsStorageError("deleteMany", { bucket, key }, err)
          }
        }),
      )
    }
  }

  async list(bucket: StorageBucket, options?: ListOptions): Promise<ListResult> {
    const prefix = this.keyspace.listPrefix(options?.prefix)

    try {
      const [files, , apiResponse] = await this.deps.client.bucket(bucket).getFiles({
        ...(prefix && { prefix }),
        ...(options?.maxKeys && { maxResults: options.maxKeys }),
        ...(options?.cursor && { pageToken: options.cursor }),
        autoPaginate: false,
      })

      const cursor = this.readPageToken(apiResponse)

      return {
        objects: this.mapListFiles(files),
        ...(cursor && { cursor }),
      }
    } catch (err) {
      throw toGcsStorageError("list", { bucket, prefix: options?.prefix ?? "" }, err)
    }
  }

  async copy(src: ObjectRef, dst: ObjectRef): Promise<void> {
    try {
      await this.getFile(src).copy(this.getFile(dst))
    } catch (err) {
      throw toGcsStorageError(
        "copy",
        { bucket: src.bucket, from: src.key, to: `${dst.bucket}/${dst.key}` },
        err,
      )
    }
  }

  async bucketExists(bucket: StorageBucket): Promise<boolean> {
    try {
      const [exists] = await this.deps.client.bucket(bucket).exists()
      return exists
    } catch (err) {
      throw toGcsStorageError("bucketExists", { bucket }, err)
    }
  }

  async listBuckets(): Promise<StorageBucket[]> {
    try {
      const [buckets] = await this.deps.client.getBuckets()
      return buckets.map((b) => b.name)
    } catch (err) {
      throw toGcsStorageError("listBuckets", {}, err)
    }
  }

  private getFile(ref: ObjectRef): File {
    return this.deps.client.bucket(ref.bucket).file(this.keyspace.apply(ref.key))
  }

  private toObjectMetadata(originalKey: string, metadata: unknown): StorageObjectMetadata {
    const m = this.toRecord(metadata)

    const sizeRaw = m.size
    const sizeInBytes =
      typeof sizeRaw === "string"
        ? parseInt(sizeRaw, 10) || 0
        : typeof sizeRaw === "number"
          ? sizeRaw
          : 0

    const updated = typeof m.updated === "string" ? m.updated : undefined
    const lastModified = this.parseDate(updated) ?? new Date()

    const etag = typeof m.etag === "string" ? m.etag : undefined
    const contentType = typeof m.contentType === "string" ? m.contentType : undefined
    const userMetadata = this.toStringRecord(m.metadata)

    return {
      key: originalKey,
      sizeInBytes,
      lastModified,
      ...(etag ? { etag } : {}),
      ...(contentType ? { contentType } : {}),
      ...(userMetadata ? { metadata: { ...userMetadata } } : {}),
    }
  }

  private mapListFiles(files: File[]): StorageObjectMetadata[] {
    return files
      .filter((file) => this.keyspace.contains(file.name))
      .map((file) => this.toObjectMetadata(this.keyspace.strip(file.name), file.metadata))
  }

  private readPageToken(apiResponse: unknown): string | undefined {
    if (!apiResponse || typeof apiResponse !== "object") return undefined

    const token: unknown = Reflect.get(apiResponse, "nextPageToken")
    return typeof token === "string" && token ? token : undefined
  }

  private parseDate(value: string | undefined): Date | null {
    if (!value) return null
    const parsed = Date.parse(value)
    return Number.isNaN(parsed) ? null : new Date(parsed)
  }

  private chunk<T>(array: T[], size: number): T[][] {
    const chunks: T[][] = []
    for (let i = 0; i < array.length; i += size) {
      chunks.push(array.slice(i, i + size))
    }
    return chunks
  }

  private toRecord(value: unknown): Record<string, unknown> {
    if (!value || typeof value !== "object") return {}
    return Object.fromEntries(Object.entries(value))
  }

  private toStringRecord(value: unknown): Record<string, string> | undefined {
    if (!value || typeof value !== "object") return undefined

    const out: Record<string, string> = {}
    for (const [k, v] of Object.entries(value)) {
      if (typeof v === "string") out[k] = v
    }

    return Object.keys(out).length > 0 ? out : undefined
  }
}
