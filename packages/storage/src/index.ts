export { S3Client } from "@aws-sdk/client-s3"
export { Storage as GcsClient } from "@google-cloud/storage"
export {
  type GcsStorageDeps,
  type GcsStorageOptions,
  GcsStorage,
} from "./adapters/gcs-storage"
export { MemoryStorage, type MemoryStorageOptions } from "./adapters/memory-storage"
export {
  type S3StorageDeps,
  type S3StorageOptions,
  S3Storage,
} from "./adapters/s3-storage"
export { BaseCloudClient, type CloudClientDeps } from "./clients/base-cloud-client"
export { type GcsCloudDeps, type GcsCloudOptions, GcsCloud } from "./clients/gcs-cloud"
export { MemoryCloud, type MemoryCloudDeps, type MemoryCloudOptions } from "./clients/memory-cloud"
export {
  DEFAULT_S3_REGION,
  type S3CloudDeps,
  type S3CloudOptions,
  S3Cloud,
} from "./clients/s3-cloud"
export {
  type CloudConfig,
  type CloudEnv,
  cloudEnvSchema,
  type LoadCloudConfigOptions,
  type LoggingConfig,
  loadCloudConfig,
  mapEnvToConfig,
} from "./config/cloud-config"
export {
  type CreateCloudClientDeps,
  createCloudClient,
  createCloudClientFromEnv,
} from "./config/create-cloud-client"
export { isDirectoryKey, parseBucketPath, toDirectoryKey } from "./core/bucket-path"
export { globToRegExp, matchesGlob } from "./core/glob"
export { Keyspace } from "./core/keyspace"
export { ObjectBucket, type ObjectBucketDeps, type ObjectBucketOptions } from "./core/object-bucket"
export {
  AlreadyExistsError,
  AuthenticationError,
  InvalidPathError,
  IOError,
  NotFoundError,
  StorageError,
  type StorageErrorCode,
  TransferError,
} from "./core/storage-errors"
export { resolveS3Credentials, type S3Credentials } from "./credentials/s3-credentials"
export {
  decodeServiceAccountKey,
  encodeServiceAccountKey,
  parseServiceAccountKey,
  readServiceAccountKeyFile,
  type ServiceAccountKey,
  serviceAccountKeySchema,
} from "./credentials/service-account-key"
export type {
  Bucket,
  BucketListOptions,
  CloudProvider,
  DownloadOptions,
  RenameOptions,
  SearchOptions,
  UploadOptions,
} from "./ports/bucket"
export type { CloudClient } from "./ports/cloud-client"
export type { StoragePort } from "./ports/storage"
export type {
  Bytes,
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "./ports/storage-object"
export type { ListOptions, PutOptions } from "./ports/storage-options"
export type { ListResult } from "./ports/storage-result"
