/**
 * Semantic value types a configuration may carry, mapped to their runtime shape.
 *
 * `integer` and `float` share the `number` representation and differ only in
 * validation.
 */
export type ValueTypeMap = {
  string: string
  boolean: boolean
  integer: number
  float: number
  string_list: readonly string[]
  string_map: Readonly<Record<string, string>>
}

export type ValueType = keyof ValueTypeMap

export type ValueOf<T extends ValueType> = ValueTypeMap[T]

export type ConfigurationValue = ValueOf<ValueType>

export const valueTypes = [
  "string",
  "boolean",
  "integer",
  "float",
  "string_list",
  "string_map",
] as const satisfies readonly ValueType[]
