import type { Context, ContextProvider } from "../../ports/context"
import { DuplicateContextParameterError } from "../errors"
import type { ContextProviderRegistry } from "./context-provider-registry"

export type ContextResult =
  | { kind: "built"; context: Context }
  | { kind: "duplicate_parameter"; error: DuplicateContextParameterError }

/**
 * Merges global providers with the providers of one call.
 *
 * Global parameters come from the first-registered provider. A per-call
 * provider claiming a parameter that a global or earlier per-call provider
 * already claimed fails the whole aggregation, even when the earlier provider
 * had no value for it.
 */
export class ContextAggregator {
  constructor(private readonly registry: ContextProviderRegistry) {}

  build(perCallProviders: readonly ContextProvider[] = []): ContextResult {
    const values = new Map<string, string>()
    const claimed = new Set<string>()

    for (const parameter of this.registry.getContextParameterKeys()) {
      const [provider] = this.registry.getProvidersFor(parameter)
      if (!provider) continue

      claimed.add(parameter)
      const value = provider.getContextParam(parameter)
      if (value !== undefined) values.set(parameter, value)
    }

    for (const provider of perCallProviders) {
      for (const parameter of new Set(provider.providedContexts)) {
        if (claimed.has(parameter)) {
          return {
            kind: "duplicate_parameter",
            error: DuplicateContextParameterError.forParameter(parameter),
          }
        }

        claimed.add(parameter)
        const value = provider.getContextParam(parameter)
        if (value !== undefined) values.set(parameter, value)
      }
    }

    // fromEntries defines own properties, so a parameter named `__proto__` is kept.
    return { kind: "built", context: Object.freeze(Object.fromEntries(values)) }
  }
}
