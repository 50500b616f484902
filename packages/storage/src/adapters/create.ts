import type { S3Client } from "@aws-sdk/client-s3"
import type { Clock } from "@tessera/clock"
import type { StoragePort } from "../ports/storage"
import { MemoryStorage } from "./memory-storage"
import { S3Storage } from "./s3-storage"

export function createMemoryStorage(deps: { clock: Clock }): StoragePort {
  return new MemoryStorage(deps)
}

export function createS3Storage(deps: { client: S3Client; clock: Clock }): StoragePort {
  return new S3Storage(deps)
}
