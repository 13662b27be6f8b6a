import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  setup: async () => {},
  make: async () => ({
    source: new ObjectSource({ tabstop: 8, autoinfo: ["command", "onkey"], ui: undefined }),
  }),
  expectedValue: () => ({ tabstop: 8, autoinfo: ["command", "onkey"], ui: undefined }),
})

describe("ObjectSource name", () => {
  it("defaults to object:overrides", () => {
    expect(new ObjectSource({}).name).toBe("object:overrides")
  })

  it("accepts a custom name", () => {
    expect(new ObjectSource({}, "object:cli").name).toBe("object:cli")
  })
})
