import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3"

export interface StoredS3Object {
  body: Buffer
  contentType?: string | undefined
  lastModified: Date
}

export const testObjectLastModified = new Date("2026-01-01T00:00:00.000Z")

/**
 * Real `S3Client` whose `send` is answered in process from a map keyed by
 * `bucket/key`. Answers PutObject and GetObject; a missing key throws `NoSuchKey`.
 */
export function createS3TestClient(): {
  client: S3Client
  bucket: string
  objects: Map<string, StoredS3Object>
  commands: unknown[]
} {
  const client = new S3Client({
    region: "us-east-1",
    credentials: {
      accessKeyId: "test",
      secretAccessKey: "test-secret",
    },
    forcePathStyle: true,
  })

  const objects = new Map<string, StoredS3Object>()
  const commands: unknown[] = []

  const send = async (command: unknown) => {
    commands.push(command)

    if (command instanceof PutObjectCommand) {
      const { Bucket, Key, Body, ContentType } = command.input
      if (!(Body instanceof Uint8Array)) throw new Error("test client only accepts buffered bodies")

      objects.set(`${Bucket}/${Key}`, {
        body: Buffer.from(Body),
        contentType: ContentType,
        lastModified: testObjectLastModified,
      })
      return { $metadata: {} }
    }

    if (command instanceof GetObjectCommand) {
      const stored = objects.get(`${command.input.Bucket}/${command.input.Key}`)
      if (!stored) throw Object.assign(new Error("The specified key does not exist."), { name: "NoSuchKey" })

      const bytes = new Uint8Array(stored.body)
      return {
        $metadata: {},
        LastModified: stored.lastModified,
        ContentType: stored.contentType,
        Body: { transformToByteArray: async () => bytes },
      }
    }

    throw new Error("unsupported command in S3 test client")
  }

  Object.assign(client, { send })

  return { client, bucket: "tessera-test-bucket", objects, commands }
}
