import { GetObjectCommand, PutObjectCommand, type S3Client } from "@aws-sdk/client-s3"
import { FakeClock } from "@tessera/clock"
import {
  createS3TestClient,
  type StoredS3Object,
  testObjectLastModified,
} from "../../../tests/utils/create-s3-test-client"
import { S3Storage } from "../../s3-storage"

describe("S3Storage (behavior)", () => {
  let client: S3Client
  let objects: Map<string, StoredS3Object>
  let commands: unknown[]
  let clock: FakeClock
  let storage: S3Storage

  beforeEach(() => {
    const setup = createS3TestClient()

    client = setup.client
    objects = setup.objects
    commands = setup.commands
    clock = new FakeClock(Date.parse("2026-06-01T00:00:00.000Z"))
    storage = new S3Storage({ client, clock })
  })

  afterEach(() => {
    client.destroy()
  })

  it("sends the body length and content type with PutObject", async () => {
    await storage.put({ bucket: "b", key: "flags.json" }, "[1,2]", {
      contentType: "application/json",
    })

    const [put] = commands
    expect(put).toBeInstanceOf(PutObjectCommand)
    if (put instanceof PutObjectCommand) {
      expect(put.input).toMatchObject({
        Bucket: "b",
        Key: "flags.json",
        ContentLength: 5,
        ContentType: "application/json",
      })
    }
    expect([...objects.keys()]).toEqual(["b/flags.json"])
  })

  it("issues a single GetObject and maps the response", async () => {
    await storage.put({ bucket: "b", key: "flags.json" }, "[]")
    commands.length = 0

    const object = await storage.get({ bucket: "b", key: "flags.json" })

    expect(commands).toHaveLength(1)
    expect(commands[0]).toBeInstanceOf(GetObjectCommand)
    expect(object).toEqual({
      key: "flags.json",
      body: Buffer.from("[]"),
      lastModified: testObjectLastModified,
    })
  })

  it("returns null for NoSuchKey", async () => {
    expect(await storage.get({ bucket: "b", key: "absent.json" })).toBeNull()
  })

  it("falls back to the clock and an empty body when the response omits them", async () => {
    const sparse = Object.assign(client, { send: async () => ({ $metadata: {} }) })
    const sparseStorage = new S3Storage({ client: sparse, clock })

    expect(await sparseStorage.get({ bucket: "b", key: "k" })).toEqual({
      key: "k",
      body: Buffer.alloc(0),
      lastModified: new Date("2026-06-01T00:00:00.000Z"),
    })
  })

  it("propagates errors other than a missing key", async () => {
    const failing = Object.assign(client, {
      send: async () => {
        throw Object.assign(new Error("Access Denied"), { name: "AccessDenied" })
      },
    })

    await expect(new S3Storage({ client: failing, clock }).get({ bucket: "b", key: "k" }))
      .rejects.toThrow("Access Denied")
  })
})
