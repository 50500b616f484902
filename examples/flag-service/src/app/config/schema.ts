import { logLevelNames } from "@tessera/logger"
import { z } from "zod"

export const flagSourceKinds = ["file", "s3"] as const

export const envSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("flag-service"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),

  FLAGS_SOURCE: z.enum(flagSourceKinds).default("file"),
  FLAGS_FILE: z.string().default("flags.json"),
  FLAGS_BUCKET: z.string().optional(),
  FLAGS_KEY: z.string().optional(),
  FLAGS_REFRESH_INTERVAL_MS: z.coerce.number().int().nonnegative().default(60_000),

  S3_REGION: z.string().default("us-east-1"),
  S3_ENDPOINT: z.url().optional(),
})

export type EnvConfig = z.output<typeof envSchema>
