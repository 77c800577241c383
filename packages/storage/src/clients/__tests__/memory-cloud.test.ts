import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { InvalidPathError, NotFoundError } from "../../core/storage-errors"
import { RecordingLogger } from "../../tests/fakes/recording-logger"
import { MemoryCloud } from "../memory-cloud"

describe("MemoryCloud", () => {
  let tmp: string
  let logger: RecordingLogger
  let cloud: MemoryCloud

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), "memory-cloud-"))
    logger = new RecordingLogger()
    cloud = new MemoryCloud({ buckets: ["media", "archive"] }, { logger })
  })

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true })
  })

  it("lists the configured buckets in order", async () => {
    expect(await cloud.listBuckets()).toEqual(["archive", "media"])
  })

  it("returns a handle for an existing bucket", async () => {
    const bucket = await cloud.getBucket("media")

    expect(bucket.name).toBe("media")
    expect(bucket.provider).toBe("memory")
  })

  it("raises NotFoundError for a missing bucket", async () => {
    const error = await cloud.getBucket("ghost").catch((e: unknown) => e)

    expect(error).toBeInstanceOf(NotFoundError)
    expect(error).toMatchObject({ context: { bucket: "ghost" } })
  })

  it("rejects a blank bucket name", () => {
    expect(() => cloud.bucket(" ")).toThrow(InvalidPathError)
  })

  it("uploads and downloads through bucket paths", async () => {
    const source = path.join(tmp, "a.txt")
    const target = path.join(tmp, "copy", "a.txt")
    await fs.writeFile(source, "hello")

    await cloud.upload(source, "media/docs/a.txt")
    await cloud.download("media/docs/a.txt", target)

    expect(await fs.readFile(target, "utf8")).toBe("hello")
    expect(await cloud.bucket("media").list()).toEqual(["docs/a.txt"])
  })

  it.each(["no-slash", "/leading", "media/"])(
    "rejects the bucket path %s",
    async (bucketPath) => {
      await expect(cloud.upload(path.join(tmp, "a.txt"), bucketPath)).rejects.toBeInstanceOf(
        InvalidPathError,
      )
      expect(logger.at("error")[0]?.meta).toMatchObject({ operation: "upload", key: bucketPath })
    },
  )

  it("tags log entries with the provider", async () => {
    await cloud.listBuckets()

    const [entry] = logger.at("debug")
    expect(entry?.message).toBe("listBuckets ok")
    expect(entry?.context).toEqual({ provider: "memory" })
  })

  it("closes without error", async () => {
    await expect(cloud.close()).resolves.toBeUndefined()
  })
})
