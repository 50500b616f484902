import type { Logger } from "@tessera/logger"
import type { Configuration } from "../../ports/configuration"
import type { ConfigurationLookup } from "../../ports/configuration-repository"
import type { ContextProvider } from "../../ports/context"
import type { ValueOf, ValueType } from "../../ports/value-type"
import type { ContextAggregator } from "../context/context-aggregator"
import type { DuplicateContextParameterError } from "../errors"
import type { ConditionsProcessor } from "../evaluation/conditions-processor"
import { isValueOfType } from "../model/value-types"

export type ConfigurationResolverDeps = {
  repository: ConfigurationLookup
  aggregator: ContextAggregator
  processor: ConditionsProcessor
  logger: Logger
}

export type ResolveResult<T extends ValueType> =
  | { kind: "resolved"; value: ValueOf<T>; configuration: Configuration }
  | { kind: "not_found"; key: string }
  | { kind: "type_mismatch"; key: string; expected: T; actual: ValueType }
  | { kind: "duplicate_context_parameter"; key: string; error: DuplicateContextParameterError }

/**
 * Resolves a key to a typed value: lookup, context aggregation, condition
 * evaluation and type check. Synchronous and free of I/O.
 */
export class ConfigurationResolver {
  private readonly logger: Logger

  constructor(private readonly deps: ConfigurationResolverDeps) {
    this.logger = deps.logger.child({ module: "configuration-resolver" })
  }

  resolve<T extends ValueType>(
    key: string,
    expectedType: T,
    providers: readonly ContextProvider[] = [],
  ): ResolveResult<T> {
    const configuration = this.deps.repository.get(key)
    if (!configuration) {
      this.logger.warn("Configuration not found", { alias: key })
      return { kind: "not_found", key }
    }

    const built = this.deps.aggregator.build(providers)
    if (built.kind === "duplicate_parameter") {
      return { kind: "duplicate_context_parameter", key, error: built.error }
    }

    const value = this.deps.processor.process(configuration, built.context)

    if (configuration.type !== expectedType || !isValueOfType(value, expectedType)) {
      this.logger.error("Configuration type mismatch", {
        alias: key,
        expectedType,
        actualType: configuration.type,
      })
      return { kind: "type_mismatch", key, expected: expectedType, actual: configuration.type }
    }

    return { kind: "resolved", value, configuration }
  }

  /**
   * Value for `key`, or `undefined` when it is missing or has another type.
   *
   * @throws DuplicateContextParameterError when two providers claim one parameter.
   */
  get<T extends ValueType>(
    key: string,
    expectedType: T,
    providers: readonly ContextProvider[] = [],
  ): ValueOf<T> | undefined {
    const result = this.resolve(key, expectedType, providers)

    switch (result.kind) {
      case "resolved":
        return result.value
      case "duplicate_context_parameter":
        throw result.error
      case "not_found":
      case "type_mismatch":
        return undefined
    }
  }
}
