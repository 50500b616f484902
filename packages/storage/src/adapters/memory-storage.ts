import type { Clock } from "@tessera/clock"
import type { PutOptions, StoragePort } from "../ports/storage"
import type { ObjectRef, StorageBody, StorageObject } from "../ports/storage-object"
import { toBuffer } from "./to-buffer"

type Entry = {
  body: Buffer
  lastModified: Date
  contentType?: string
}

export interface MemoryStorageDeps {
  clock: Clock
}

/** Keeps objects in process. Bodies are copied in and out. */
export class MemoryStorage implements StoragePort {
  private readonly entries = new Map<string, Entry>()

  constructor(private readonly deps: MemoryStorageDeps) {}

  async put(ref: ObjectRef, body: StorageBody, options: PutOptions = {}): Promise<void> {
    this.entries.set(entryKey(ref), {
      body: toBuffer(body),
      lastModified: this.deps.clock.now(),
      ...(options.contentType && { contentType: options.contentType }),
    })
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    const entry = this.entries.get(entryKey(ref))
    if (!entry) return null

    return {
      key: ref.key,
      body: Buffer.from(entry.body),
      lastModified: new Date(entry.lastModified.getTime()),
      ...(entry.contentType && { contentType: entry.contentType }),
    }
  }
}

// Bucket names cannot contain "/", so the pair maps to a unique string.
function entryKey(ref: ObjectRef): string {
  return `${ref.bucket}/${ref.key}`
}
