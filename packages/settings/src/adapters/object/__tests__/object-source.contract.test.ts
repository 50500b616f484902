import { describeSettingsSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeSettingsSourceContract({
  name: "ObjectSource",
  make: () => new ObjectSource({ FLAGS_SOURCE: "file" }),
  expected: { FLAGS_SOURCE: "file" },
})

describe("ObjectSource behavior", () => {
  it("labels itself with the given name", () => {
    expect(new ObjectSource({}).name).toBe("object:overrides")
    expect(new ObjectSource({}, "test").name).toBe("object:test")
  })
})
