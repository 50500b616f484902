import { readFile } from "node:fs/promises"
import { resolve } from "node:path"
import type { ContentLoader } from "../../ports/content-loader"
import { ContentLoadError } from "../../core/errors"

const isMissingFile = (err: unknown): boolean =>
  err instanceof Error && "code" in err && err.code === "ENOENT"

/** Reads the payload from a local file on every call. */
export class FileContentLoader implements ContentLoader {
  readonly location: string

  constructor(private readonly path: string) {
    this.location = path.length > 0 ? `file://${resolve(path)}` : ""
  }

  async loadContent(): Promise<string> {
    try {
      return await readFile(this.path, "utf8")
    } catch (err) {
      if (isMissingFile(err)) throw ContentLoadError.notFound(this.location)
      throw ContentLoadError.loadFailed(this.location, err)
    }
  }
}
