import type { ObjectRef, StorageBody, StorageObject } from "./storage-object"

export interface PutOptions {
  contentType?: string
}

/** Whole-object reads and writes against a bucket. */
export interface StoragePort {
  /** Replaces any object stored under `ref`. */
  put(ref: ObjectRef, body: StorageBody, options?: PutOptions): Promise<void>

  /** The object with its full body, or `null` when nothing is stored under `ref`. */
  get(ref: ObjectRef): Promise<StorageObject | null>
}
