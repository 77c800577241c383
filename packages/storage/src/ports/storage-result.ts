import type { StorageObjectMetadata } from "./storage-object"

export interface ListResult {
  objects: StorageObjectMetadata[]

  /** Token for the next page. Undefined on the last page. */
  cursor?: string
}
