import {
  ConditionsProcessor,
  ConfigurationResolver,
  type ContextProvider,
  ContextAggregator,
  ContextProviderRegistry,
  FixedRateScheduler,
  JsonConfigurationParser,
  RemoteConfigurationRepository,
  StaticContextProvider,
} from "@tessera/flags"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type FlagServices = {
  scheduler: FixedRateScheduler
  repository: RemoteConfigurationRepository
  registry: ContextProviderRegistry
  resolver: ConfigurationResolver
}

/** Parameters every resolution sees, regardless of the caller. */
export function createGlobalContextProviders(config: AppConfig): ContextProvider[] {
  return [
    new StaticContextProvider({
      environment: config.app.env,
      service: config.logging.serviceName,
    }),
  ]
}

/**
 * Loads the configuration set once, then keeps it fresh on a fixed schedule.
 *
 * Rejects when the initial load fails; the service does not start without
 * configurations.
 */
export async function createFlagServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): Promise<FlagServices> {
  const { clock, logger } = core

  const scheduler = new FixedRateScheduler({ clock, logger })

  const repository = await RemoteConfigurationRepository.create(
    {
      loader: infra.flagSource,
      parser: new JsonConfigurationParser(),
      scheduler,
      clock,
      logger,
    },
    { refreshIntervalMs: config.flags.refreshIntervalMs },
  )

  const registry = new ContextProviderRegistry(createGlobalContextProviders(config))

  const resolver = new ConfigurationResolver({
    repository,
    aggregator: new ContextAggregator(registry),
    processor: new ConditionsProcessor(),
    logger,
  })

  return { scheduler, repository, registry, resolver }
}
