import type { ObjectRef, StorageObject, StoragePort } from "@tessera/storage"
import type { ContentLoader } from "../../ports/content-loader"
import { ContentLoadError } from "../../core/errors"

export type StorageContentLoaderDeps = {
  storage: StoragePort
}

export type StorageContentLoaderOptions = {
  /** Scheme used in `location`. Default: `s3`. */
  scheme?: string
}

/** Reads the payload from object storage as UTF-8 text on every call. */
export class StorageContentLoader implements ContentLoader {
  readonly location: string

  constructor(
    private readonly deps: StorageContentLoaderDeps,
    private readonly ref: ObjectRef,
    options: StorageContentLoaderOptions = {},
  ) {
    this.location =
      ref.bucket.length > 0 && ref.key.length > 0
        ? `${options.scheme ?? "s3"}://${ref.bucket}/${ref.key}`
        : ""
  }

  async loadContent(): Promise<string> {
    let object: StorageObject | null
    try {
      object = await this.deps.storage.get(this.ref)
    } catch (err) {
      throw ContentLoadError.loadFailed(this.location, err)
    }

    if (!object) throw ContentLoadError.notFound(this.location)

    return object.body.toString("utf8")
  }
}
