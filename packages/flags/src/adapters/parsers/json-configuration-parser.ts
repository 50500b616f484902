import { z } from "zod"
import type { Configuration, ConfigurationInput } from "../../ports/configuration"
import type { ConfigurationParser } from "../../ports/configuration-parser"
import { valueTypes } from "../../ports/value-type"
import {
  ConfigurationError,
  ConfigurationParseError,
  type PayloadIssue,
} from "../../core/errors"
import { createConfiguration } from "../../core/model/configuration"

const requiredValue = (name: string) =>
  z.unknown().refine((value) => value !== undefined, `${name} is required`)

// A `__proto__` key would not survive as an own property of the parsed record.
const parameterName = z
  .string()
  .refine((name) => name !== "__proto__", "__proto__ is not a valid parameter name")

const conditionSchema = z.object({
  match: z.record(parameterName, z.string()),
  value: requiredValue("value"),
})

const configurationSchema = z.object({
  alias: z.string().min(1),
  description: z.string().default(""),
  type: z.enum(valueTypes).optional(),
  defaultValue: requiredValue("defaultValue"),
  conditions: z.array(conditionSchema).default([]),
})

export const configurationPayloadSchema = z.array(configurationSchema)

export type ConfigurationPayload = z.input<typeof configurationPayloadSchema>

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

/**
 * Parses a JSON array of configurations.
 *
 * ```json
 * [{ "alias": "checkout.expressEnabled", "defaultValue": false,
 *    "conditions": [{ "match": { "region": "EU" }, "value": true }] }]
 * ```
 */
export class JsonConfigurationParser implements ConfigurationParser {
  parseConfigurations(text: string): readonly Configuration[] {
    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (err) {
      throw ConfigurationParseError.malformed(err)
    }

    const parsed = configurationPayloadSchema.safeParse(json)
    if (!parsed.success) {
      const issues: PayloadIssue[] = parsed.error.issues.map((issue) => ({
        path: formatPath(issue.path),
        message: issue.message,
      }))
      throw ConfigurationParseError.invalidPayload(issues)
    }

    return parsed.data.map((entry, index) => {
      const input: ConfigurationInput = {
        alias: entry.alias,
        description: entry.description,
        defaultValue: entry.defaultValue,
        conditions: entry.conditions.map((condition) => ({
          match: condition.match,
          value: condition.value,
        })),
        ...(entry.type && { type: entry.type }),
      }

      try {
        return createConfiguration(input)
      } catch (err) {
        if (err instanceof ConfigurationError) {
          throw ConfigurationParseError.invalidConfiguration(index, err)
        }
        throw err
      }
    })
  }
}
