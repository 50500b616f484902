import type { Condition, Configuration, ConfigurationInput } from "../../ports/configuration"
import type { ValueOf, ValueType } from "../../ports/value-type"
import { ConfigurationError } from "../errors"
import { describeValue, inferValueType, isValueOfType } from "./value-types"

/**
 * Validates `input` and returns a deep-frozen configuration.
 *
 * The value type is taken from `input.type`, or inferred from the default value
 * when absent. Every condition value must have that type.
 *
 * @throws ConfigurationError (`invalid_configuration`) when any of this does not hold.
 */
export function createConfiguration(input: ConfigurationInput): Configuration {
  if (input.alias.trim().length === 0) {
    throw ConfigurationError.invalid(input.alias, "alias must not be empty")
  }

  const type = input.type ?? inferValueType(input.defaultValue)
  if (type === undefined) {
    throw ConfigurationError.invalid(
      input.alias,
      `cannot infer a value type from a default value of type ${describeValue(input.defaultValue)}`,
    )
  }

  return deepFreeze(buildConfiguration(input, type))
}

function buildConfiguration<T extends ValueType>(
  input: ConfigurationInput,
  type: T,
): Configuration<T> {
  const { alias, defaultValue } = input

  if (!isValueOfType(defaultValue, type)) {
    throw ConfigurationError.invalid(
      alias,
      `default value of type ${describeValue(defaultValue)} is not a valid ${type}`,
    )
  }

  const conditions: Condition<ValueOf<T>>[] = []

  for (const [index, condition] of (input.conditions ?? []).entries()) {
    const { value } = condition

    if (!isValueOfType(value, type)) {
      throw ConfigurationError.invalid(
        alias,
        `condition #${index} value of type ${describeValue(value)} is not a valid ${type}`,
      )
    }

    conditions.push({ match: { ...condition.match }, value: structuredClone(value) })
  }

  return {
    alias,
    description: input.description ?? "",
    type,
    conditions,
    defaultValue: structuredClone(defaultValue),
  }
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const nested of Object.values(value)) deepFreeze(nested)
  }
  return value
}
