import { Command, Option } from "commander"
import { z } from "zod"
import { Binder } from "../../../core/binder"
import { bindCommanderOptions, CommanderFlag } from "../commander-flag"

function program(): Command {
  return new Command()
    .exitOverride()
    .option("-p, --port <number>", "listen port", "8080")
    .option("--verbose", "verbose output")
    .option("--tag <tags...>", "tags")
    .addOption(new Option("--region <name>", "region").env("COMMANDER_FLAG_TEST_REGION"))
}

function parsed(args: string[]): Command {
  return program().parse(args, { from: "user" })
}

describe("CommanderFlag", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it("is named after the long option", () => {
    expect(new CommanderFlag(parsed([]), "port").name).toBe("--port")
  })

  it("falls back to the attribute name for unknown options", () => {
    const flag = new CommanderFlag(parsed([]), "missing")

    expect(flag.name).toBe("missing")
    expect(flag.changed).toBe(false)
    expect(flag.value()).toBe("")
  })

  it("reads values given with the short option", () => {
    const flag = new CommanderFlag(parsed(["-p", "9090"]), "port")

    expect(flag.changed).toBe(true)
    expect(flag.value()).toBe("9090")
  })

  it("renders boolean options", () => {
    expect(new CommanderFlag(parsed(["--verbose"]), "verbose").value()).toBe("true")
    expect(new CommanderFlag(parsed([]), "verbose").value()).toBe("")
  })

  it("joins variadic values with commas", () => {
    expect(new CommanderFlag(parsed(["--tag", "a", "b"]), "tag").value()).toBe("a,b")
  })

  it("does not count values taken from the environment as changed", () => {
    vi.stubEnv("COMMANDER_FLAG_TEST_REGION", "eu-west")

    const flag = new CommanderFlag(parsed([]), "region")

    expect(flag.value()).toBe("eu-west")
    expect(flag.changed).toBe(false)
  })
})

describe("bindCommanderOptions", () => {
  const schema = z.object({
    server: z.object({ port: z.int(), verbose: z.boolean() }),
  })

  it("binds options to field paths so only explicit values apply", () => {
    const binder = new Binder()
    const config = { server: { port: 1, verbose: false } }
    bindCommanderOptions(binder, parsed(["--verbose"]), { "server.port": "port", "server.verbose": "verbose" })

    binder.bindFlags(schema, config)

    expect(config).toEqual({ server: { port: 1, verbose: true } })
  })
})
