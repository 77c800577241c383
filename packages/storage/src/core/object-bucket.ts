import { createWriteStream, type Dirent, type Stats } from "node:fs"
import fs from "node:fs/promises"
import path from "node:path"
import { pipeline } from "node:stream/promises"
import type { Logger } from "@cloudbucket/logger"
import type {
  Bucket,
  BucketListOptions,
  CloudProvider,
  DownloadOptions,
  RenameOptions,
  SearchOptions,
  UploadOptions,
} from "../ports/bucket"
import type { StoragePort } from "../ports/storage"
import type { ObjectRef, StorageKey, StorageObjectMetadata } from "../ports/storage-object"
import { isDirectoryKey, toDirectoryKey } from "./bucket-path"
import { globToRegExp } from "./glob"
import { logOperation } from "./log-operation"
import {
  AlreadyExistsError,
  InvalidPathError,
  IOError,
  NotFoundError,
  TransferError,
} from "./storage-errors"

const DEFAULT_LIST_PAGE_SIZE = 1000

export interface ObjectBucketDeps {
  storage: StoragePort
  logger: Logger
}

export interface ObjectBucketOptions {
  /** Page size used while walking listings */
  listPageSize?: number
}

/**
 * Bucket handle over any StoragePort. Adds directory semantics, overwrite
 * checks, local file I/O and one log entry per operation.
 */
export class ObjectBucket implements Bucket {
  private readonly logger: Logger
  private readonly storage: StoragePort
  private readonly listPageSize: number

  constructor(
    readonly name: string,
    readonly provider: CloudProvider,
    deps: ObjectBucketDeps,
    options: ObjectBucketOptions = {},
  ) {
    this.storage = deps.storage
    this.logger = deps.logger.child({ bucket: name })
    this.listPageSize = options.listPageSize ?? DEFAULT_LIST_PAGE_SIZE
  }

  upload(localPath: string, key: StorageKey, options: UploadOptions = {}): Promise<void> {
    return this.run("upload", key, async () => {
      const stat = await this.statLocal(localPath)

      if (stat.isDirectory()) {
        await this.uploadDirectory(localPath, key, options)
        return
      }

      this.assertKey("upload", key)
      await this.uploadFile(localPath, key, options)
    })
  }

  download(key: StorageKey, localPath: string, options: DownloadOptions = {}): Promise<void> {
    return this.run("download", key, async () => {
      this.assertKey("download", key)

      if (!isDirectoryKey(key)) {
        await this.downloadFile(key, localPath, options)
        return
      }

      const keys = (await this.collectKeys(key)).filter((k) => !isDirectoryKey(k))
      if (keys.length === 0) throw NotFoundError.prefix(this.ref(key))

      const targets = keys.map((objectKey) => ({
        objectKey,
        target: this.localTarget(localPath, objectKey, objectKey.slice(key.length)),
      }))

      for (const { objectKey, target } of targets) {
        await this.downloadFile(objectKey, target, options)
      }
    })
  }

  delete(key: StorageKey): Promise<void> {
    return this.run("delete", key, async () => {
      this.assertKey("delete", key)

      if (isDirectoryKey(key)) {
        const keys = await this.collectKeys(key)
        if (keys.length === 0) throw NotFoundError.prefix(this.ref(key))

        await this.storage.deleteMany(this.name, keys)
        return
      }

      if (!(await this.storage.exists(this.ref(key)))) {
        throw NotFoundError.object(this.ref(key))
      }

      await this.storage.delete(this.ref(key))
    })
  }

  rename(oldKey: StorageKey, newKey: StorageKey, options: RenameOptions = {}): Promise<void> {
    return this.run("rename", oldKey, async () => {
      this.assertKey("rename", oldKey)
      this.assertKey("rename", newKey)

      if (isDirectoryKey(oldKey)) {
        await this.renameDirectory(oldKey, toDirectoryKey(newKey), options)
        return
      }

      const source = this.ref(oldKey)
      if (!(await this.storage.exists(source))) throw NotFoundError.object(source)
      if (oldKey === newKey) return

      const destination = this.ref(newKey)
      if (!options.overwrite && (await this.storage.exists(destination))) {
        throw AlreadyExistsError.remote(destination)
      }

      await this.storage.copy(source, destination)
      await this.deleteAfterCopy(source, newKey, () => this.storage.delete(source))
    })
  }

  list(options: BucketListOptions = {}): Promise<StorageKey[]> {
    return this.run("list", options.prefix ?? "", async () => {
      const matcher = options.pattern === undefined ? undefined : globToRegExp(options.pattern)
      const limit = options.maxResults ?? Number.POSITIVE_INFINITY
      const keys: StorageKey[] = []

      if (limit <= 0) return keys

      for await (const page of this.pages(options.prefix)) {
        for (const object of page) {
          if (matcher && !matcher.test(object.key)) continue

          keys.push(object.key)
          if (keys.length >= limit) return keys
        }
      }

      return keys
    })
  }

  search(pattern: string, options: SearchOptions = {}): Promise<StorageKey[]> {
    const directory = toDirectoryKey(options.directory ?? "")

    return this.list({ prefix: directory, pattern: `${directory}${pattern}` })
  }

  exists(key: StorageKey): Promise<boolean> {
    return this.run("exists", key, async () => {
      this.assertKey("exists", key)
      return this.storage.exists(this.ref(key))
    })
  }

  head(key: StorageKey): Promise<StorageObjectMetadata | null> {
    return this.run("head", key, async () => {
      this.assertKey("head", key)
      return this.storage.head(this.ref(key))
    })
  }

  private async uploadDirectory(
    localDir: string,
    key: StorageKey,
    options: UploadOptions,
  ): Promise<void> {
    const files = await this.walkLocal(localDir)
    if (files.length === 0) throw IOError.emptyDirectory(localDir)

    const base = key.replace(/\/+$/, "")

    for (const file of files) {
      const relative = path.relative(localDir, file).split(path.sep).join("/")
      await this.uploadFile(file, base ? `${base}/${relative}` : relative, options)
    }
  }

  private async uploadFile(
    localPath: string,
    key: StorageKey,
    options: UploadOptions,
  ): Promise<void> {
    const ref = this.ref(key)

    if (options.overwrite === false && (await this.storage.exists(ref))) {
      throw AlreadyExistsError.remote(ref)
    }

    let data: Buffer
    try {
      data = await fs.readFile(localPath)
    } catch (err) {
      throw IOError.read(localPath, err)
    }

    await this.storage.put(ref, data, {
      ...(options.contentType && { contentType: options.contentType }),
    })
  }

  private async downloadFile(
    key: StorageKey,
    localPath: string,
    options: DownloadOptions,
  ): Promise<void> {
    if (options.overwrite === false && (await this.localExists(localPath))) {
      throw AlreadyExistsError.local(localPath)
    }

    const object = await this.storage.get(this.ref(key))
    if (!object) throw NotFoundError.object(this.ref(key))

    try {
      await fs.mkdir(path.dirname(localPath), { recursive: true })
    } catch (err) {
      object.body.destroy()
      throw IOError.write(localPath, err)
    }

    try {
      await pipeline(object.body, createWriteStream(localPath))
    } catch (err) {
      if (isSystemError(err)) throw IOError.write(localPath, err)
      throw TransferError.from("download", { bucket: this.name, key }, err)
    }
  }

  private async renameDirectory(
    oldPrefix: StorageKey,
    newPrefix: StorageKey,
    options: RenameOptions,
  ): Promise<void> {
    const keys = await this.collectKeys(oldPrefix)
    if (keys.length === 0) throw NotFoundError.prefix(this.ref(oldPrefix))
    if (oldPrefix === newPrefix) return
    if (newPrefix.startsWith(oldPrefix) || oldPrefix.startsWith(newPrefix)) {
      throw InvalidPathError.nestedRename(oldPrefix, newPrefix)
    }

    const moves = keys.map((key) => ({
      from: this.ref(key),
      to: this.ref(`${newPrefix}${key.slice(oldPrefix.length)}`),
    }))

    if (!options.overwrite) {
      for (const { to } of moves) {
        if (await this.storage.exists(to)) throw AlreadyExistsError.remote(to)
      }
    }

    for (const { from, to } of moves) {
      await this.storage.copy(from, to)
    }

    await this.deleteAfterCopy(this.ref(oldPrefix), newPrefix, () =>
      this.storage.deleteMany(this.name, keys),
    )
  }

  private async deleteAfterCopy(
    source: ObjectRef,
    newKey: StorageKey,
    remove: () => Promise<void>,
  ): Promise<void> {
    try {
      await remove()
    } catch (err) {
      this.logger.warn("rename copied the source but could not delete it", {
        operation: "rename",
        key: source.key,
        to: newKey,
        err,
      })
      throw TransferError.partialRename(source, newKey, err)
    }
  }

  private async collectKeys(prefix: string): Promise<StorageKey[]> {
    const keys: StorageKey[] = []

    for await (const page of this.pages(prefix)) {
      keys.push(...page.map((object) => object.key))
    }

    return keys
  }

  private async *pages(prefix?: string): AsyncGenerator<StorageObjectMetadata[]> {
    let cursor: string | undefined

    do {
      const page = await this.storage.list(this.name, {
        ...(prefix && { prefix }),
        maxKeys: this.listPageSize,
        ...(cursor && { cursor }),
      })

      yield page.objects
      cursor = page.cursor
    } while (cursor)
  }

  private async statLocal(localPath: string): Promise<Stats> {
    try {
      return await fs.stat(localPath)
    } catch (err) {
      if (readCode(err) === "ENOENT") throw IOError.localPathMissing(localPath, err)
      throw IOError.read(localPath, err)
    }
  }

  private async localExists(localPath: string): Promise<boolean> {
    try {
      await fs.access(localPath)
      return true
    } catch (err) {
      if (readCode(err) === "ENOENT") return false
      throw IOError.read(localPath, err)
    }
  }

  private async walkLocal(dir: string): Promise<string[]> {
    let entries: Dirent[]
    try {
      entries = await fs.readdir(dir, { withFileTypes: true })
    } catch (err) {
      throw IOError.read(dir, err)
    }

    const files: string[] = []

    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const full = path.join(dir, entry.name)

      if (entry.isDirectory()) files.push(...(await this.walkLocal(full)))
      else if (entry.isFile()) files.push(full)
    }

    return files
  }

  private localTarget(localDir: string, key: StorageKey, relative: string): string {
    const root = path.resolve(localDir)
    const target = path.resolve(root, ...relative.split("/"))
    const inside = path.relative(root, target)

    if (
      !inside ||
      inside === ".." ||
      inside.startsWith(`..${path.sep}`) ||
      path.isAbsolute(inside)
    ) {
      throw IOError.outsideTarget(localDir, key)
    }

    return target
  }

  private assertKey(operation: string, key: StorageKey): void {
    if (!key.trim()) throw InvalidPathError.blankKey(operation)
  }

  private ref(key: StorageKey): ObjectRef {
    return { bucket: this.name, key }
  }

  private run<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    return logOperation(this.logger, operation, key, { bucket: this.name, key }, fn)
  }
}

function readCode(err: unknown): unknown {
  return err && typeof err === "object" ? Reflect.get(err, "code") : undefined
}

// fs failures carry `syscall`; stream failures from the SDK do not.
function isSystemError(err: unknown): boolean {
  return err instanceof Error && typeof Reflect.get(err, "syscall") === "string"
}
