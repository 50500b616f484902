import { FileContentLoader, type ContentLoader, StorageContentLoader } from "@tessera/flags"
import { createS3Storage, S3Client } from "@tessera/storage"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraClients = {
  /** Where the configuration payload is read from on every refresh. */
  flagSource: ContentLoader

  /** Present when flags come from S3; destroyed on stop. */
  s3Client?: S3Client
}

export function createDefaultInfraClients(
  config: AppConfig,
  core: CoreServices,
): InfraClients {
  const source = config.flags.source

  if (source.kind === "file") {
    return { flagSource: new FileContentLoader(source.path) }
  }

  const s3Client = new S3Client({
    region: source.region,
    ...(source.endpoint && { endpoint: source.endpoint, forcePathStyle: true }),
  })

  const storage = createS3Storage({ client: s3Client, clock: core.clock })

  return {
    s3Client,
    flagSource: new StorageContentLoader(
      { storage },
      { bucket: source.bucket, key: source.key },
    ),
  }
}
