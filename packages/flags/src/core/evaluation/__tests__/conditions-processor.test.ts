import { createConfiguration } from "../../model/configuration"
import { ConditionsProcessor } from "../conditions-processor"

describe("ConditionsProcessor", () => {
  const processor = new ConditionsProcessor()

  describe("single-parameter condition", () => {
    const configuration = createConfiguration({
      alias: "flag.x",
      defaultValue: false,
      conditions: [{ match: { region: "EU" }, value: true }],
    })

    it.each<[Record<string, string>, boolean]>([
      [{ region: "EU" }, true],
      [{ region: "US" }, false],
      [{}, false],
      [{ region: "eu" }, false],
      [{ region: "EU", segment: "vip" }, true],
    ])("resolves %j to %s", (context, expected) => {
      expect(processor.process(configuration, context)).toBe(expected)
    })
  })

  describe("precedence", () => {
    const configuration = createConfiguration({
      alias: "banner.text",
      defaultValue: "default",
      conditions: [
        { match: { region: "EU", segment: "vip" }, value: "eu-vip" },
        { match: { region: "EU" }, value: "eu" },
        { match: { segment: "vip" }, value: "vip" },
      ],
    })

    it("returns the first condition whose parameters all match", () => {
      expect(processor.process(configuration, { region: "EU", segment: "vip" })).toBe("eu-vip")
      expect(processor.process(configuration, { region: "EU", segment: "basic" })).toBe("eu")
      expect(processor.process(configuration, { region: "US", segment: "vip" })).toBe("vip")
    })

    it("requires every parameter of a condition", () => {
      expect(processor.process(configuration, { segment: "basic" })).toBe("default")
    })
  })

  it("matches an empty condition unconditionally", () => {
    const configuration = createConfiguration({
      alias: "search.limit",
      defaultValue: 10,
      conditions: [
        { match: { tenant: "acme" }, value: 50 },
        { match: {}, value: 20 },
      ],
    })

    expect(processor.process(configuration, { tenant: "acme" })).toBe(50)
    expect(processor.process(configuration, {})).toBe(20)
  })

  it("does not match parameters inherited from the prototype", () => {
    const configuration = createConfiguration({
      alias: "odd.keys",
      defaultValue: "default",
      conditions: [{ match: { toString: "x" }, value: "matched" }],
    })

    expect(processor.process(configuration, {})).toBe("default")
  })

  it("matches a parameter named __proto__ only when the context has it", () => {
    const configuration = createConfiguration({
      alias: "odd.proto",
      defaultValue: "default",
      conditions: [{ match: Object.fromEntries([["__proto__", "x"]]), value: "matched" }],
    })

    expect(processor.process(configuration, {})).toBe("default")
    expect(processor.process(configuration, Object.fromEntries([["__proto__", "x"]]))).toBe(
      "matched",
    )
  })

  it("returns condition values of structured types", () => {
    const configuration = createConfiguration({
      alias: "catalog.tags",
      defaultValue: ["all"],
      conditions: [{ match: { region: "EU" }, value: ["eu", "gdpr"] }],
    })

    expect(processor.process(configuration, { region: "EU" })).toEqual(["eu", "gdpr"])
    expect(processor.process(configuration, { region: "US" })).toEqual(["all"])
  })
})
