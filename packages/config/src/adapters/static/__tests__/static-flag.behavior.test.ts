import { StaticFlag } from "../static-flag"

describe("StaticFlag", () => {
  it("defaults to an empty value", () => {
    const flag = new StaticFlag("host")

    expect(flag.value()).toBe("")
    expect(flag.changed).toBe(false)
  })

  it("returns to its default on reset", () => {
    const flag = new StaticFlag("port", "8080")
    flag.set("9090")

    flag.reset()

    expect(flag.changed).toBe(false)
    expect(flag.value()).toBe("8080")
  })
})
