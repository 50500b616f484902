import type { Milliseconds } from "@tessera/clock"
import type { LogLevelName } from "@tessera/logger"

export type FlagSourceConfig =
  | { kind: "file"; path: string }
  | { kind: "s3"; bucket: string; key: string; region: string; endpoint?: string }

export type AppConfig = {
  app: {
    env: string
  }
  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
  flags: {
    source: FlagSourceConfig
    refreshIntervalMs: Milliseconds
  }
}

export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
