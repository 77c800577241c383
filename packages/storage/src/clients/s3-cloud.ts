import { S3Client } from "@aws-sdk/client-s3"
import { S3Storage } from "../adapters/s3-storage"
import { resolveS3Credentials } from "../credentials/s3-credentials"
import { BaseCloudClient, type CloudClientDeps } from "./base-cloud-client"

export const DEFAULT_S3_REGION = "us-east-1"

export interface S3CloudOptions {
  accessKeyId?: string | undefined
  secretAccessKey?: string | undefined
  sessionToken?: string | undefined

  /** Default: "us-east-1" */
  region?: string | undefined

  /** Custom endpoint for S3-compatible services (MinIO, LocalStack) */
  endpoint?: string | undefined
  forcePathStyle?: boolean | undefined

  keyspacePrefix?: string | undefined
}

export interface S3CloudDeps extends CloudClientDeps {
  /** Prebuilt SDK client. Credentials are still validated. */
  client?: S3Client
}

/**
 * @example
 * ```typescript
 * const s3 = new S3Cloud({ accessKeyId, secretAccessKey, region: "eu-west-1" })
 * const media = await s3.getBucket("media")
 * await media.upload("./cat.png", "photos/cat.png")
 * ```
 */
export class S3Cloud extends BaseCloudClient {
  readonly region: string
  private readonly client: S3Client

  constructor(options: S3CloudOptions, deps: S3CloudDeps = {}) {
    const credentials = resolveS3Credentials(options)
    const region = options.region || DEFAULT_S3_REGION

    const client =
      deps.client ??
      new S3Client({
        region,
        credentials,
        ...(options.endpoint && { endpoint: options.endpoint }),
        ...(options.forcePathStyle !== undefined && { forcePathStyle: options.forcePathStyle }),
      })

    super(
      "s3",
      new S3Storage(
        { client },
        { ...(options.keyspacePrefix && { keyspacePrefix: options.keyspacePrefix }) },
      ),
      deps,
    )

    this.region = region
    this.client = client
  }

  override async close(): Promise<void> {
    this.client.destroy()
  }
}
