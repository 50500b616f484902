import type { ContextProvider } from "../../ports/context"
import type { ValueOf, ValueType } from "../../ports/value-type"
import type { ConfigurationResolver } from "../resolution/configuration-resolver"

/** Accessor name to the value type it resolves to. */
export type NamespaceSpec = Readonly<Record<string, ValueType>>

export type ConfigurationDescriptor = {
  key: string
  type: ValueType
}

export type AccessorName<S extends NamespaceSpec> = keyof S & string

/**
 * Typed group of configuration keys sharing a prefix.
 *
 * @example
 * ```ts
 * const checkout = defineConfigurationNamespace("checkout", {
 *   expressEnabled: "boolean",
 *   maxItems: "integer",
 * })
 *
 * checkout.keyFor("maxItems") // "checkout.maxItems"
 * checkout.bind(resolver).get("expressEnabled", regionProvider) // boolean | undefined
 * ```
 */
export class NamespaceDefinition<S extends NamespaceSpec> {
  constructor(
    readonly namespace: string,
    readonly spec: S,
  ) {}

  keyFor(name: AccessorName<S>): string {
    return `${this.namespace}.${name}`
  }

  descriptors(): readonly ConfigurationDescriptor[] {
    return Object.entries(this.spec).map(([name, type]) => ({
      key: `${this.namespace}.${name}`,
      type,
    }))
  }

  bind(resolver: ConfigurationResolver): ConfigurationNamespace<S> {
    return new ConfigurationNamespace(this, resolver)
  }
}

export class ConfigurationNamespace<S extends NamespaceSpec> {
  constructor(
    private readonly definition: NamespaceDefinition<S>,
    private readonly resolver: ConfigurationResolver,
  ) {}

  keyFor(name: AccessorName<S>): string {
    return this.definition.keyFor(name)
  }

  descriptors(): readonly ConfigurationDescriptor[] {
    return this.definition.descriptors()
  }

  get<K extends AccessorName<S>>(
    name: K,
    ...providers: ContextProvider[]
  ): ValueOf<S[K]> | undefined {
    return this.resolver.get(this.keyFor(name), this.definition.spec[name], providers)
  }
}

export function defineConfigurationNamespace<S extends NamespaceSpec>(
  namespace: string,
  spec: S,
): NamespaceDefinition<S> {
  if (namespace.trim().length === 0) {
    throw new Error("Configuration namespace must not be empty")
  }

  const copy: S = { ...spec }
  Object.freeze(copy)

  return new NamespaceDefinition(namespace, copy)
}
