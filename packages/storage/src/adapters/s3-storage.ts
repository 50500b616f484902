import { GetObjectCommand, PutObjectCommand, type S3Client } from "@aws-sdk/client-s3"
import type { Clock } from "@tessera/clock"
import type { PutOptions, StoragePort } from "../ports/storage"
import type { ObjectRef, StorageBody, StorageObject } from "../ports/storage-object"
import { toBuffer } from "./to-buffer"

export interface S3StorageDeps {
  client: S3Client
  clock: Clock
}

export class S3Storage implements StoragePort {
  constructor(private readonly deps: S3StorageDeps) {}

  async put(ref: ObjectRef, body: StorageBody, options: PutOptions = {}): Promise<void> {
    const buffer = toBuffer(body)

    await this.deps.client.send(
      new PutObjectCommand({
        Bucket: ref.bucket,
        Key: ref.key,
        Body: buffer,
        ContentLength: buffer.length,
        ...(options.contentType && { ContentType: options.contentType }),
      }),
    )
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    try {
      const response = await this.deps.client.send(
        new GetObjectCommand({ Bucket: ref.bucket, Key: ref.key }),
      )
      const bytes = await response.Body?.transformToByteArray()

      return {
        key: ref.key,
        body: bytes ? Buffer.from(bytes) : Buffer.alloc(0),
        lastModified: response.LastModified ?? this.deps.clock.now(),
        ...(response.ContentType && { contentType: response.ContentType }),
      }
    } catch (err) {
      if (isNoSuchKey(err)) return null
      throw err
    }
  }
}

function isNoSuchKey(err: unknown): boolean {
  return err instanceof Error && (err.name === "NoSuchKey" || err.name === "NotFound")
}
