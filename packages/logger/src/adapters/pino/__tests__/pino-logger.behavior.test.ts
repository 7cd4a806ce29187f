import { Writable } from "node:stream"

import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parseLine(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "null")
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { module: "binder" })

    logger.debug("applied environment value", { path: "server.port", key: "APP_SERVER_PORT" })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines[0])

    expect(payload).toMatchObject({
      msg: "applied environment value",
      module: "binder",
      path: "server.port",
      key: "APP_SERVER_PORT",
      level: 20,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("defaults to the info level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination })

    logger.debug("hidden")
    logger.info("shown")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0]).msg).toBe("shown")
  })

  it("child() inherits the base logger sink and config", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { module: "binder" })
    const child = base.child({ source: "flag" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0])).toMatchObject({
      msg: "logged",
      module: "binder",
      source: "flag",
    })
  })

  it("serializes errors with their cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })
    const err = new Error("error setting field for APP_PORT", {
      cause: new Error("invalid int"),
    })

    logger.error("binding failed", { err })

    const payload = parseLine(lines[0])

    expect(payload.err).toMatchObject({
      type: "Error",
      message: "error setting field for APP_PORT",
      cause: { type: "Error", message: "invalid int" },
    })
  })
})
