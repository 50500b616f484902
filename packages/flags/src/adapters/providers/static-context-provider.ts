import type { ContextProvider } from "../../ports/context"

/** Provider answering from a fixed set of parameters. */
export class StaticContextProvider implements ContextProvider {
  readonly providedContexts: readonly string[]
  private readonly values: ReadonlyMap<string, string>

  constructor(values: Readonly<Record<string, string>>) {
    this.values = new Map(Object.entries(values))
    this.providedContexts = Object.freeze([...this.values.keys()])
  }

  getContextParam(name: string): string | undefined {
    return this.values.get(name)
  }
}
