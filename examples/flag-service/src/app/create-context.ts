import { fileURLToPath } from "node:url"
import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type AppServices, createDefaultDomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createDefaultInfraClients, type InfraClients } from "./services/infra"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv

  /** Raw settings applied after the environment, e.g. `{ FLAGS_FILE: "..." }`. */
  settingsOverrides?: Record<string, unknown>
  infraOverrides?: Partial<InfraClients>
  coreOverrides?: Partial<CoreServices>

  /** Directory `.env.*` files and relative paths resolve against. */
  cwd?: string
}

export type AppContext = {
  config: AppConfig
  infra: InfraClients
  services: AppServices
  createStopHooks: CreateStopHooksFn
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const projectRoot = fileURLToPath(new URL("../..", import.meta.url))

  const config = await loadAppConfig(
    options.env ?? process.env,
    options.settingsOverrides,
    options.cwd ?? projectRoot,
  )

  const core: CoreServices = { ...createCoreServices(config), ...options.coreOverrides }
  const infra: InfraClients = {
    ...createDefaultInfraClients(config, core),
    ...options.infraOverrides,
  }

  let domains: AppServices["domains"]
  try {
    domains = await createDefaultDomainServices(config, infra, core)
  } catch (err) {
    infra.s3Client?.destroy()
    throw err
  }

  return {
    config,
    infra,
    services: { core, domains },
    createStopHooks,
  }
}
