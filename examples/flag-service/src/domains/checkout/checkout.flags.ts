import { defineConfigurationNamespace } from "@tessera/flags"

export const checkoutFlags = defineConfigurationNamespace("checkout", {
  expressEnabled: "boolean",
  maxItems: "integer",
  currencies: "string_list",
})

export type CheckoutFlagSpec = typeof checkoutFlags.spec
