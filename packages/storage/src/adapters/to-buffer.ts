import type { StorageBody } from "../ports/storage-object"

export function toBuffer(body: StorageBody): Buffer {
  return typeof body === "string" ? Buffer.from(body, "utf8") : Buffer.from(body)
}
