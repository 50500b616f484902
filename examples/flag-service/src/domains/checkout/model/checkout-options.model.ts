export type CheckoutRequest = {
  region: string
  segment?: string
}

export type CheckoutOptions = {
  expressEnabled: boolean
  maxItems: number
  currencies: readonly string[]
}

/** Used for any option whose configuration is missing or mistyped. */
export const defaultCheckoutOptions: CheckoutOptions = Object.freeze({
  expressEnabled: false,
  maxItems: 10,
  currencies: Object.freeze(["USD"]),
})
