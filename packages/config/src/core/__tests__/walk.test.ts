import { z } from "zod"
import { InvalidTargetError } from "../errors"
import { compilePlan } from "../plan"
import { joinEnvKey, joinPath, walkFields } from "../walk"
import { serverSchema } from "./fixtures"

const schema = z.object({
  server: z.object({
    port: z.int(),
    host: z.string(),
  }),
  debug: z.boolean(),
})

const plan = compilePlan(schema, () => undefined)

function visited(target: unknown, prefix = "APP"): string[][] {
  const seen: string[][] = []
  walkFields(plan, target, prefix, (_leaf, _slot, path, key) => seen.push([path, key]))
  return seen
}

describe("walkFields", () => {
  it("visits leaves depth-first in declaration order", () => {
    expect(visited({ server: { port: 0, host: "" }, debug: false })).toEqual([
      ["server.port", "APP_SERVER_PORT"],
      ["server.host", "APP_SERVER_HOST"],
      ["debug", "APP_DEBUG"],
    ])
  })

  it("computes the same paths and keys on every walk", () => {
    const target = { server: { port: 0, host: "" }, debug: false }

    expect(visited(target)).toEqual(visited(target))
  })

  it("never puts a separator against an empty prefix", () => {
    expect(visited({}, "")).toEqual([
      ["server.port", "SERVER_PORT"],
      ["server.host", "SERVER_HOST"],
      ["debug", "DEBUG"],
    ])
  })

  it("creates a missing aggregate only when one of its leaves is set", () => {
    const target: Record<string, unknown> = {}

    walkFields(plan, target, "", (leaf, slot) => {
      expect(slot.get()).toBeUndefined()
      if (leaf.name === "port") slot.set(8080)
    })

    expect(target).toEqual({ server: { port: 8080 } })
  })

  it("reads and writes the field in place", () => {
    const target = { server: { port: 1, host: "a" }, debug: false }

    walkFields(plan, target, "", (leaf, slot) => {
      if (leaf.name === "port") slot.set(Number(slot.get()) + 1)
    })

    expect(target.server.port).toBe(2)
  })

  it("skips fields that cannot be written", () => {
    const target = { server: Object.freeze({ port: 1, host: "a" }) }
    Object.defineProperty(target, "debug", { get: () => true, enumerable: true })

    expect(visited(target)).toEqual([])
  })

  it("skips missing fields of a non-extensible holder", () => {
    const target = Object.preventExtensions({ server: { port: 1, host: "a" } })

    expect(visited(target).map(([path]) => path)).toEqual(["server.port", "server.host"])
  })

  it.each([[null], [undefined], [42], ["config"], [[1, 2]]])("rejects %j as a target", (target) => {
    expect(() => visited(target)).toThrow(InvalidTargetError)
  })

  it("rejects a non-object value where an aggregate belongs", () => {
    expect(() => visited({ server: 5 })).toThrow("expected an object at server, got number")
  })

  it("treats a null aggregate as missing", () => {
    const target: Record<string, unknown> = { server: null }

    walkFields(compilePlan(serverSchema, () => undefined), target, "", (leaf, slot) => {
      if (leaf.name === "host") slot.set("example.com")
    })

    expect(target).toEqual({ server: { host: "example.com" } })
  })
})

describe("joinPath", () => {
  it("joins with dots, skipping empty parts", () => {
    expect(joinPath("server", "port")).toBe("server.port")
    expect(joinPath("", "port")).toBe("port")
  })
})

describe("joinEnvKey", () => {
  it("joins with underscores, skipping empty parts", () => {
    expect(joinEnvKey("APP", "PORT")).toBe("APP_PORT")
    expect(joinEnvKey("", "PORT")).toBe("PORT")
    expect(joinEnvKey("APP", "")).toBe("APP")
  })
})
