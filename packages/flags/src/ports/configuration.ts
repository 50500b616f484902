import type { ValueOf, ValueType } from "./value-type"

export type ConfigurationAlias = string

/** Context parameter name to the exact value it must have. */
export type ConditionMatch = Readonly<Record<string, string>>

export interface Condition<V> {
  readonly match: ConditionMatch
  readonly value: V
}

export interface Configuration<T extends ValueType = ValueType> {
  readonly alias: ConfigurationAlias
  readonly description: string
  readonly type: T
  readonly conditions: readonly Condition<ValueOf<T>>[]
  readonly defaultValue: ValueOf<T>
}

/** Unvalidated configuration shape accepted by `createConfiguration`. */
export interface ConfigurationInput {
  alias: string
  description?: string
  type?: ValueType
  defaultValue: unknown
  conditions?: readonly { match: Readonly<Record<string, string>>; value: unknown }[]
}
