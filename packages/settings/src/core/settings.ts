import type { ISettings } from "../ports/settings"

export class Settings<T extends Record<string, unknown>> implements ISettings<T> {
  private readonly data: T

  constructor(
    data: T,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
  ) {
    const copy: T = { ...data }

    Object.freeze(copy)
    this.data = copy
  }

  get value(): T {
    return this.data
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  unknownKeys(): string[] {
    const known = new Set(this.keys())

    return [...this.providedKeys].filter((k) => !known.has(k))
  }
}
