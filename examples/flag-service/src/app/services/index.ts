import {
  type CheckoutServices,
  createCheckoutServices,
} from "../../domains/checkout/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import { createFlagServices, type FlagServices } from "./flags"
import type { InfraClients } from "./infra"

export type DomainServices = {
  flags: FlagServices
  checkout: CheckoutServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export async function createDefaultDomainServices(
  config: AppConfig,
  infra: InfraClients,
  core: CoreServices,
): Promise<DomainServices> {
  const flags = await createFlagServices(config, core, infra)
  const checkout = createCheckoutServices(flags, core)

  return { flags, checkout }
}
