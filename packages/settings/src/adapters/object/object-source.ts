import type { SettingsSource } from "../../ports/source"

/** Fixed values, typically overrides supplied by tests or the composition root. */
export class ObjectSource implements SettingsSource {
  readonly name: string

  constructor(
    private readonly values: Record<string, unknown>,
    name = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
