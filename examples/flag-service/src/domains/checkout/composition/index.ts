import type { ConfigurationNamespace } from "@tessera/flags"
import type { CoreServices } from "../../../app/services/core"
import type { FlagServices } from "../../../app/services/flags"
import { type CheckoutFlagSpec, checkoutFlags } from "../checkout.flags"
import { CheckoutOptionsService } from "../services/checkout-options.service"

export type CheckoutServices = {
  flags: ConfigurationNamespace<CheckoutFlagSpec>
  checkoutOptions: CheckoutOptionsService
}

export function createCheckoutServices(
  flagServices: FlagServices,
  core: CoreServices,
): CheckoutServices {
  const flags = checkoutFlags.bind(flagServices.resolver)

  return {
    flags,
    checkoutOptions: new CheckoutOptionsService({ flags, logger: core.logger }),
  }
}
