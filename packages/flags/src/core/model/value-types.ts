import type { ValueOf, ValueType } from "../../ports/value-type"

const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false

  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export function isValueOfType<T extends ValueType>(
  value: unknown,
  type: T,
): value is ValueOf<T>
export function isValueOfType(value: unknown, type: ValueType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string"
    case "boolean":
      return typeof value === "boolean"
    case "integer":
      return typeof value === "number" && Number.isSafeInteger(value)
    case "float":
      return typeof value === "number" && Number.isFinite(value)
    case "string_list":
      return Array.isArray(value) && value.every((item) => typeof item === "string")
    case "string_map":
      return (
        isPlainRecord(value) && Object.values(value).every((item) => typeof item === "string")
      )
  }
}

/**
 * Value type of a default value when the payload does not declare one.
 *
 * Integral numbers are `integer`, other finite numbers `float`.
 */
export function inferValueType(value: unknown): ValueType | undefined {
  if (typeof value === "string") return "string"
  if (typeof value === "boolean") return "boolean"
  if (typeof value === "number") {
    if (Number.isSafeInteger(value)) return "integer"
    return Number.isFinite(value) ? "float" : undefined
  }
  if (isValueOfType(value, "string_list")) return "string_list"
  if (isValueOfType(value, "string_map")) return "string_map"

  return undefined
}

/** Short label for log lines and error messages, e.g. `number`, `array`. */
export function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}
