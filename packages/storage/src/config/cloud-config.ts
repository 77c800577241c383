import { DotenvSource, EnvSource, loadConfig } from "@cloudbucket/config"
import { type LogLevelName, logLevelNames } from "@cloudbucket/logger"
import { z } from "zod"
import type { GcsCloudOptions } from "../clients/gcs-cloud"
import type { MemoryCloudOptions } from "../clients/memory-cloud"
import type { S3CloudOptions } from "../clients/s3-cloud"
import { decodeServiceAccountKey } from "../credentials/service-account-key"
import type { CloudProvider } from "../ports/bucket"

export const cloudEnvSchema = z.object({
  CLOUD_PROVIDER: z.enum(["s3", "gcs", "memory"]).default("s3"),

  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_SESSION_TOKEN: z.string().optional(),
  AWS_DEFAULT_REGION: z.string().min(1).default("us-east-1"),
  AWS_ENDPOINT_URL: z.url().optional(),
  S3_FORCE_PATH_STYLE: z.stringbool().default(false),

  GOOGLE_CLOUD_PROJECT: z.string().optional(),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  SERVICE_KEY_CONTENT: z.string().optional(),
  GCS_ENDPOINT: z.url().optional(),

  STORAGE_KEYSPACE_PREFIX: z.string().default(""),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  SERVICE_NAME: z.string().min(1).default("cloudbucket"),
})

export type CloudEnv = z.infer<typeof cloudEnvSchema>

export interface LoggingConfig {
  level: LogLevelName
  prettify: boolean
  service: string
}

/**
 * Everything needed to build a client, resolved once at the process boundary.
 * Core classes never read the environment themselves.
 */
export interface CloudConfig {
  provider: CloudProvider
  s3: S3CloudOptions
  gcs: GcsCloudOptions
  memory: MemoryCloudOptions
  logging: LoggingConfig
}

export interface LoadCloudConfigOptions {
  /** Directory holding the optional `.env` file. Default: process.cwd() */
  cwd?: string
}

export async function loadCloudConfig(
  env: Record<string, string | undefined> = process.env,
  options: LoadCloudConfigOptions = {},
): Promise<CloudConfig> {
  const config = await loadConfig({
    schema: cloudEnvSchema,
    sources: [
      new DotenvSource({
        file: ".env",
        required: false,
        ...(options.cwd && { cwd: options.cwd }),
      }),
      new EnvSource({ env }),
    ],
  })

  return mapEnvToConfig(config.value)
}

export function mapEnvToConfig(env: CloudEnv): CloudConfig {
  const keyspacePrefix = env.STORAGE_KEYSPACE_PREFIX

  return {
    provider: env.CLOUD_PROVIDER,
    s3: {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      sessionToken: env.AWS_SESSION_TOKEN,
      region: env.AWS_DEFAULT_REGION,
      endpoint: env.AWS_ENDPOINT_URL,
      forcePathStyle: env.S3_FORCE_PATH_STYLE,
      keyspacePrefix,
    },
    gcs: {
      projectId: env.GOOGLE_CLOUD_PROJECT,
      keyFilename: env.GOOGLE_APPLICATION_CREDENTIALS,
      // A key file wins; content is only decoded for gcs without one.
      credentials:
        env.CLOUD_PROVIDER === "gcs" &&
        !env.GOOGLE_APPLICATION_CREDENTIALS &&
        env.SERVICE_KEY_CONTENT
          ? decodeServiceAccountKey(env.SERVICE_KEY_CONTENT)
          : undefined,
      apiEndpoint: env.GCS_ENDPOINT,
      keyspacePrefix,
    },
    memory: { keyspacePrefix },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      service: env.SERVICE_NAME,
    },
  }
}
