import { type ConfigurationNamespace, StaticContextProvider } from "@tessera/flags"
import type { Logger } from "@tessera/logger"
import type { CheckoutFlagSpec } from "../checkout.flags"
import {
  type CheckoutOptions,
  type CheckoutRequest,
  defaultCheckoutOptions,
} from "../model/checkout-options.model"

export type CheckoutOptionsServiceDeps = {
  flags: ConfigurationNamespace<CheckoutFlagSpec>
  logger: Logger
}

export class CheckoutOptionsService {
  private readonly logger: Logger

  constructor(private readonly deps: CheckoutOptionsServiceDeps) {
    this.logger = deps.logger.child({ module: "checkout-options" })
  }

  /**
   * @throws DuplicateContextParameterError when `request` supplies a parameter a
   * global provider already owns.
   */
  optionsFor(request: CheckoutRequest): CheckoutOptions {
    const { flags } = this.deps
    const requestContext = new StaticContextProvider({
      region: request.region,
      ...(request.segment !== undefined && { segment: request.segment }),
    })

    const options: CheckoutOptions = {
      expressEnabled:
        flags.get("expressEnabled", requestContext) ?? defaultCheckoutOptions.expressEnabled,
      maxItems: flags.get("maxItems", requestContext) ?? defaultCheckoutOptions.maxItems,
      currencies: flags.get("currencies", requestContext) ?? defaultCheckoutOptions.currencies,
    }

    this.logger.debug("Checkout options resolved", { region: request.region, ...options })

    return options
  }
}
