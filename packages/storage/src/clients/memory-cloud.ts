import { MemoryStorage } from "../adapters/memory-storage"
import type { StorageBucket } from "../ports/storage-object"
import { BaseCloudClient, type CloudClientDeps } from "./base-cloud-client"

export interface MemoryCloudOptions {
  buckets?: StorageBucket[] | undefined
  keyspacePrefix?: string | undefined
}

export interface MemoryCloudDeps extends CloudClientDeps {
  /** Prebuilt store. `options` are ignored when given. */
  storage?: MemoryStorage
}

/** Same surface as the remote clients, backed by process memory. */
export class MemoryCloud extends BaseCloudClient {
  constructor(options: MemoryCloudOptions = {}, deps: MemoryCloudDeps = {}) {
    super(
      "memory",
      deps.storage ??
        new MemoryStorage({
          ...(options.buckets && { buckets: options.buckets }),
          ...(options.keyspacePrefix && { keyspacePrefix: options.keyspacePrefix }),
        }),
      deps,
    )
  }
}
