import { createHash } from "node:crypto"
import { Readable } from "node:stream"
import { Keyspace } from "../core/keyspace"
import { NotFoundError } from "../core/storage-errors"
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

const DEFAULT_PAGE_SIZE = 1000

interface StoredObject {
  data: Buffer
  contentType?: string
  metadata?: Record<string, string>
  lastModified: Date
}

export interface MemoryStorageOptions {
  /** Buckets that exist from the start. Others appear on first write. */
  buckets?: StorageBucket[]

  /** Same meaning as on the remote adapters. */
  keyspacePrefix?: string
}

/**
 * In-process provider. Keys list in lexicographic order; the cursor is the
 * last key of the previous page.
 */
export class MemoryStorage implements StoragePort {
  private readonly buckets = new Map<StorageBucket, Map<StorageKey, StoredObject>>()
  private readonly keyspace: Keyspace

  constructor(options: MemoryStorageOptions = {}) {
    this.keyspace = new Keyspace(options.keyspacePrefix)

    for (const bucket of options.buckets ?? []) {
      this.createBucket(bucket)
    }
  }

  createBucket(bucket: StorageBucket): void {
    this.getOrCreateBucket(bucket)
  }

  async put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const buffer = await this.toBuffer(data)
    const bucket = this.getOrCreateBucket(ref.bucket)

    bucket.set(this.keyspace.apply(ref.key), {
      data: buffer,
      lastModified: new Date(),
      ...(options?.contentType && { contentType: options.contentType }),
      ...(options?.metadata && { metadata: { ...options.metadata } }),
    })
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    const stored = this.getStoredObject(ref)
    if (!stored) return null

    return this.toObjectMetadata(ref.key, stored)
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    return this.getStoredObject(ref) !== undefined
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    const stored = this.getStoredObject(ref)
    if (!stored) return null

    return {
      ...this.toObjectMetadata(ref.key, stored),
      body: Readable.from([Buffer.from(stored.data)]),
    }
  }

  async delete(ref: ObjectRef): Promise<void> {
    this.buckets.get(ref.bucket)?.delete(this.keyspace.apply(ref.key))
  }

  async deleteMany(bucket: StorageBucket, keys: StorageKey[]): Promise<void> {
    const bucketMap = this.buckets.get(bucket)
    if (!bucketMap) return

    for (const key of keys) {
      bucketMap.delete(this.keyspace.apply(key))
    }
  }

  async list(bucket: StorageBucket, options?: ListOptions): Promise<ListResult> {
    const bucketMap = this.buckets.get(bucket)
    if (!bucketMap) return { objects: [] }

    const maxKeys = options?.maxKeys ?? DEFAULT_PAGE_SIZE
    const keys = this.getFilteredSortedKeys(
      bucketMap,
      this.keyspace.apply(options?.prefix ?? ""),
      options?.cursor === undefined ? undefined : this.keyspace.apply(options.cursor),
    )

    const objects: StorageObjectMetadata[] = []

    for (const key of keys.slice(0, maxKeys)) {
      const stored = bucketMap.get(key)
      if (stored) objects.push(this.toObjectMetadata(this.keyspace.strip(key), stored))
    }

    const last = objects.at(-1)
    const hasMore = keys.length > maxKeys

    return {
      objects,
      ...(hasMore && last && { cursor: last.key }),
    }
  }

  async copy(src: ObjectRef, dst: ObjectRef): Promise<void> {
    const srcStored = this.getStoredObject(src)
    if (!srcStored) throw NotFoundError.object(src)

    this.getOrCreateBucket(dst.bucket).set(this.keyspace.apply(dst.key), {
      data: Buffer.from(srcStored.data),
      lastModified: new Date(),
      ...(srcStored.contentType && { contentType: srcStored.contentType }),
      ...(srcStored.metadata && { metadata: { ...srcStored.metadata } }),
    })
  }

  async bucketExists(bucket: StorageBucket): Promise<boolean> {
    return this.buckets.has(bucket)
  }

  async listBuckets(): Promise<StorageBucket[]> {
    return [...this.buckets.keys()].sort()
  }

  private getOrCreateBucket(bucket: StorageBucket): Map<StorageKey, StoredObject> {
    let bucketMap = this.buckets.get(bucket)
    if (!bucketMap) {
      bucketMap = new Map()
      this.buckets.set(bucket, bucketMap)
    }
    return bucketMap
  }

  private getStoredObject(ref: ObjectRef): StoredObject | undefined {
    return this.buckets.get(ref.bucket)?.get(this.keyspace.apply(ref.key))
  }

  private toObjectMetadata(key: string, stored: StoredObject): StorageObjectMetadata {
    return {
      key,
      sizeInBytes: stored.data.length,
      lastModified: stored.lastModified,
      etag: this.computeEtag(stored.data),
      ...(stored.contentType && { contentType: stored.contentType }),
      ...(stored.metadata && { metadata: { ...stored.metadata } }),
    }
  }

  private getFilteredSortedKeys(
    bucketMap: Map<StorageKey, StoredObject>,
    prefix: string,
    cursor?: string,
  ): string[] {
    const keys = Array.from(bucketMap.keys())
      .filter((key) => key.startsWith(prefix))
      .sort()

    if (!cursor) return keys

    return keys.slice(this.findFirstGreaterThan(keys, cursor))
  }

  private findFirstGreaterThan(sortedKeys: string[], value: string): number {
    let lo = 0
    let hi = sortedKeys.length

    while (lo < hi) {
      const mid = (lo + hi) >> 1

      const midValue = sortedKeys[mid]
      if (midValue === undefined) break

      if (midValue <= value) {
        lo = mid + 1
      } else {
        hi = mid
      }
    }

    return lo
  }

  private async toBuffer(data: StorageData): Promise<Buffer> {
    if (data instanceof Uint8Array) return Buffer.from(data)

    const chunks: Buffer[] = []
    for await (const chunk of data) {
      chunks.push(chunk instanceof Uint8Array ? Buffer.from(chunk) : Buffer.from(String(chunk)))
    }

    return Buffer.concat(chunks)
  }

  private computeEtag(data: Buffer): string {
    return `"${createHash("md5").update(data).digest("hex")}"`
  }
}
