/** Parameter name to value, built fresh for one resolution. */
export type Context = Readonly<Record<string, string>>

/**
 * Supplier of named context parameters.
 *
 * `getContextParam` returning `undefined` means the provider has no value for
 * this call; the parameter is then left out of the context.
 */
export interface ContextProvider {
  readonly providedContexts: readonly string[]
  getContextParam(name: string): string | undefined
}
