import type { ContextProvider } from "../../ports/context"

/**
 * Process-wide context providers, indexed by the parameters they supply.
 *
 * When several providers supply the same parameter, the one registered first
 * is consulted.
 */
export class ContextProviderRegistry {
  private readonly byParameter = new Map<string, ContextProvider[]>()

  constructor(providers: readonly ContextProvider[] = []) {
    for (const provider of providers) this.register(provider)
  }

  register(provider: ContextProvider): void {
    for (const parameter of new Set(provider.providedContexts)) {
      const providers = this.byParameter.get(parameter)

      if (providers) {
        if (!providers.includes(provider)) providers.push(provider)
      } else {
        this.byParameter.set(parameter, [provider])
      }
    }
  }

  /** Parameters with at least one provider, in first-registration order. */
  getContextParameterKeys(): readonly string[] {
    return [...this.byParameter.keys()]
  }

  getProvidersFor(parameter: string): readonly ContextProvider[] {
    return this.byParameter.get(parameter) ?? []
  }
}
