import { StaticContextProvider } from "../static-context-provider"

describe("StaticContextProvider", () => {
  it("provides the keys and values it was built with", () => {
    const provider = new StaticContextProvider({ region: "EU", segment: "vip" })

    expect(provider.providedContexts).toEqual(["region", "segment"])
    expect(provider.getContextParam("region")).toBe("EU")
    expect(provider.getContextParam("tenant")).toBeUndefined()
  })

  it("is not affected by later changes to the source record", () => {
    const values = { region: "EU" }
    const provider = new StaticContextProvider(values)

    values.region = "US"

    expect(provider.getContextParam("region")).toBe("EU")
    expect(Object.isFrozen(provider.providedContexts)).toBe(true)
  })
})
