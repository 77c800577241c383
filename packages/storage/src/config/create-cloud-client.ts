import { createPinoLogger, type Logger } from "@cloudbucket/logger"
import { GcsCloud } from "../clients/gcs-cloud"
import { MemoryCloud } from "../clients/memory-cloud"
import { S3Cloud } from "../clients/s3-cloud"
import type { CloudClient } from "../ports/cloud-client"
import { type CloudConfig, type LoadCloudConfigOptions, loadCloudConfig } from "./cloud-config"

export interface CreateCloudClientDeps {
  /** Replaces the pino logger built from `config.logging`. */
  logger?: Logger
}

export function createCloudClient(
  config: CloudConfig,
  deps: CreateCloudClientDeps = {},
): CloudClient {
  const logger =
    deps.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.service },
    )

  switch (config.provider) {
    case "s3":
      return new S3Cloud(config.s3, { logger })
    case "gcs":
      return new GcsCloud(config.gcs, { logger })
    case "memory":
      return new MemoryCloud(config.memory, { logger })
  }
}

/**
 * @example
 * ```typescript
 * const client = await createCloudClientFromEnv()
 * await client.upload("./report.csv", "reports/2024/report.csv")
 * await client.close()
 * ```
 */
export async function createCloudClientFromEnv(
  env: Record<string, string | undefined> = process.env,
  options: LoadCloudConfigOptions = {},
  deps: CreateCloudClientDeps = {},
): Promise<CloudClient> {
  return createCloudClient(await loadCloudConfig(env, options), deps)
}
