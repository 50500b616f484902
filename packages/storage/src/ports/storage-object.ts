/** Path-like identifier of an object within a bucket, e.g. `flags/production.json`. */
export type StorageKey = string

export type StorageBucket = string

export interface ObjectRef {
  bucket: StorageBucket
  key: StorageKey
}

/** Accepted by `put`. Strings are stored as UTF-8. */
export type StorageBody = string | Uint8Array

export interface StorageObject {
  key: StorageKey
  body: Buffer
  lastModified: Date
  contentType?: string
}
