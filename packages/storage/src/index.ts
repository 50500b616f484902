export { S3Client } from "@aws-sdk/client-s3"
export { createMemoryStorage, createS3Storage } from "./adapters/create"
export { MemoryStorage, type MemoryStorageDeps } from "./adapters/memory-storage"
export { S3Storage, type S3StorageDeps } from "./adapters/s3-storage"
export type { PutOptions, StoragePort } from "./ports/storage"
export type {
  ObjectRef,
  StorageBody,
  StorageBucket,
  StorageKey,
  StorageObject,
} from "./ports/storage-object"
