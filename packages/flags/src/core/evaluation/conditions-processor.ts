import type { ConditionMatch, Configuration } from "../../ports/configuration"
import type { Context } from "../../ports/context"
import type { ValueOf, ValueType } from "../../ports/value-type"

/**
 * Picks the value of the first condition, in declared order, whose every
 * parameter is present in the context with exactly the expected value; falls
 * back to the default value.
 */
export class ConditionsProcessor {
  process<T extends ValueType>(configuration: Configuration<T>, context: Context): ValueOf<T> {
    for (const condition of configuration.conditions) {
      if (matches(condition.match, context)) return condition.value
    }

    return configuration.defaultValue
  }
}

function matches(match: ConditionMatch, context: Context): boolean {
  return Object.entries(match).every(
    ([parameter, expected]) => Object.hasOwn(context, parameter) && context[parameter] === expected,
  )
}
