import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { GcsCloud } from "../../clients/gcs-cloud"
import { MemoryCloud } from "../../clients/memory-cloud"
import { S3Cloud } from "../../clients/s3-cloud"
import { AuthenticationError } from "../../core/storage-errors"
import { encodeServiceAccountKey } from "../../credentials/service-account-key"
import { RecordingLogger } from "../../tests/fakes/recording-logger"
import { loadCloudConfig } from "../cloud-config"
import { createCloudClient, createCloudClientFromEnv } from "../create-cloud-client"

describe("createCloudClient", () => {
  let cwd: string
  let logger: RecordingLogger

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "create-client-"))
    logger = new RecordingLogger()
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("builds an S3 client", async () => {
    const config = await loadCloudConfig(
      { AWS_ACCESS_KEY_ID: "test-key", AWS_SECRET_ACCESS_KEY: "test-secret" },
      { cwd },
    )

    const client = createCloudClient(config, { logger })

    expect(client).toBeInstanceOf(S3Cloud)
    await client.close()
  })

  it("fails fast without S3 credentials", async () => {
    const config = await loadCloudConfig({}, { cwd })

    expect(() => createCloudClient(config, { logger })).toThrow(AuthenticationError)
  })

  it("builds a GCS client from key content", async () => {
    const config = await loadCloudConfig(
      {
        CLOUD_PROVIDER: "gcs",
        SERVICE_KEY_CONTENT: encodeServiceAccountKey({
          project_id: "test-project",
          client_email: "svc@test-project.iam.gserviceaccount.com",
          private_key: "test-private-key",
        }),
      },
      { cwd },
    )

    const client = createCloudClient(config, { logger })

    expect(client).toBeInstanceOf(GcsCloud)
    expect(client).toMatchObject({ projectId: "test-project" })
  })

  it("builds a memory client that logs through the given logger", async () => {
    const client = await createCloudClientFromEnv({ CLOUD_PROVIDER: "memory" }, { cwd }, { logger })

    expect(client).toBeInstanceOf(MemoryCloud)
    expect(await client.listBuckets()).toEqual([])
    expect(logger.at("debug")[0]?.context).toEqual({ provider: "memory" })
  })

  it("falls back to a pino logger", async () => {
    const config = await loadCloudConfig({ CLOUD_PROVIDER: "memory", LOG_LEVEL: "fatal" }, { cwd })

    await expect(createCloudClient(config).listBuckets()).resolves.toEqual([])
  })
})
