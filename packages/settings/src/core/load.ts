import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { ISettings } from "../ports/settings"
import type { SettingsSource } from "../ports/source"
import { Settings } from "./settings"

export type LoadSettingsOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Applied in order, later wins. Defaults to the process environment. */
  sources?: SettingsSource[]
}

export class SettingsValidationError extends Error {
  constructor(readonly issues: string) {
    super(`Settings validation failed:\n${issues}`)
    this.name = "SettingsValidationError"
  }
}

export async function loadSettings<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadSettingsOptions<T>): Promise<ISettings<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new SettingsValidationError(z.prettifyError(result.error))
  }

  const known = new Set(Object.keys(result.data))
  const usedProvenance = Object.fromEntries(
    Object.entries(provenance).filter(([key]) => known.has(key)),
  )

  return new Settings<T>(result.data, usedProvenance, new Set(Object.keys(merged)))
}
