import { SystemClock } from "@tessera/clock"
import { describeStorageContract } from "../../../ports/__tests__/storage.contract"
import { createS3TestClient } from "../../../tests/utils/create-s3-test-client"
import { S3Storage } from "../../s3-storage"

describeStorageContract({
  name: "S3Storage",
  createAdapter: async () => {
    const { client, bucket } = createS3TestClient()

    return { bucket, storage: new S3Storage({ client, clock: new SystemClock() }) }
  },
})
