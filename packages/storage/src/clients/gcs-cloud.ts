import { Storage as GcsClient } from "@google-cloud/storage"
import { GcsStorage } from "../adapters/gcs-storage"
import { AuthenticationError } from "../core/storage-errors"
import {
  parseServiceAccountKey,
  readServiceAccountKeyFile,
  type ServiceAccountKey,
} from "../credentials/service-account-key"
import { BaseCloudClient, type CloudClientDeps } from "./base-cloud-client"

export interface GcsCloudOptions {
  /** Default: the key's `project_id` */
  projectId?: string | undefined

  /** Path to a service-account JSON key */
  keyFilename?: string | undefined

  /** Decoded key content. Only used without `keyFilename`. */
  credentials?: ServiceAccountKey | undefined

  /** Custom API endpoint (fake-gcs-server) */
  apiEndpoint?: string | undefined

  keyspacePrefix?: string | undefined
}

export interface GcsCloudDeps extends CloudClientDeps {
  client?: GcsClient
}

export class GcsCloud extends BaseCloudClient {
  readonly projectId: string | undefined

  constructor(options: GcsCloudOptions, deps: GcsCloudDeps = {}) {
    const key = resolveServiceAccountKey(options)
    const projectId = options.projectId || key.project_id

    const client =
      deps.client ??
      new GcsClient({
        ...(projectId && { projectId }),
        credentials: { client_email: key.client_email, private_key: key.private_key },
        ...(options.apiEndpoint && { apiEndpoint: options.apiEndpoint }),
      })

    super(
      "gcs",
      new GcsStorage(
        { client },
        { ...(options.keyspacePrefix && { keyspacePrefix: options.keyspacePrefix }) },
      ),
      deps,
    )

    this.projectId = projectId
  }
}

function resolveServiceAccountKey(options: GcsCloudOptions): ServiceAccountKey {
  if (options.keyFilename) return readServiceAccountKeyFile(options.keyFilename)
  if (options.credentials) return parseServiceAccountKey(options.credentials)

  throw AuthenticationError.missingCredentials("gcs", ["keyFilename or credentials"])
}
