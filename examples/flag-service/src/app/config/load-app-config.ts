import path from "node:path"
import {
  DotenvSource,
  EnvSource,
  loadSettings,
  ObjectSource,
  type SettingsSource,
} from "@tessera/settings"
import type { AppConfig, FlagSourceConfig } from "."
import { type EnvConfig, envSchema } from "./schema"

function mapFlagSource(env: EnvConfig, cwd: string): FlagSourceConfig {
  if (env.FLAGS_SOURCE === "s3") {
    return {
      kind: "s3",
      // Left empty when unset so the repository rejects the location at startup.
      bucket: env.FLAGS_BUCKET ?? "",
      key: env.FLAGS_KEY ?? "",
      region: env.S3_REGION,
      ...(env.S3_ENDPOINT !== undefined && { endpoint: env.S3_ENDPOINT }),
    }
  }

  return { kind: "file", path: path.resolve(cwd, env.FLAGS_FILE) }
}

export function mapEnvToConfig(env: EnvConfig, cwd: string): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    flags: {
      source: mapFlagSource(env, cwd),
      refreshIntervalMs: env.FLAGS_REFRESH_INTERVAL_MS,
    },
  }
}

/**
 * Reads `.env.<NODE_ENV>` (optional), then the process environment, then
 * `overrides`. Later sources win. Relative paths resolve against `cwd`.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides: Record<string, unknown> = {},
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const nodeEnv = env.NODE_ENV ?? "development"

  const sources: SettingsSource[] = [
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd }),
    new EnvSource({ env }),
    new ObjectSource(overrides),
  ]

  const settings = await loadSettings({ schema: envSchema, sources })

  return mapEnvToConfig(settings.value, cwd)
}
