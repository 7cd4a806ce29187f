import { BaseError, serializeError } from "@stratum/errors"
import {
  ConfigError,
  DocumentError,
  FieldBindingError,
  InvalidTargetError,
  InvalidValueError,
  isConfigError,
  MarshalError,
  ParseValueError,
  UnsupportedTypeError,
} from "../errors"

describe("config errors", () => {
  it("chain the cause into the message and keep it as the cause", () => {
    const cause = new InvalidValueError("int", ParseValueError.syntax("x"))
    const err = new FieldBindingError("env", "server.port", "APP_SERVER_PORT", cause)

    expect(err.message).toBe('error setting field for APP_SERVER_PORT: invalid int: parsing "x": invalid syntax')
    expect(err.cause).toBe(cause)
    expect(err.source).toBe("env")
    expect(err.path).toBe("server.port")
    expect(err.key).toBe("APP_SERVER_PORT")
  })

  it("are config errors and base errors", () => {
    const err = DocumentError.readFailed("/etc/app.yaml", new Error("EACCES"))

    expect(err).toBeInstanceOf(ConfigError)
    expect(err).toBeInstanceOf(BaseError)
    expect(isConfigError(err)).toBe(true)
    expect(isConfigError(new Error("plain"))).toBe(false)
    expect(err.name).toBe("DocumentError")
  })

  it("mark programmer errors as not operational", () => {
    expect(new InvalidTargetError("bad target").isOperational).toBe(false)
    expect(new UnsupportedTypeError("array").isOperational).toBe(false)
    expect(DocumentError.parseFailed(new Error("bad")).isOperational).toBe(true)
  })

  it("serialize with code, context and the cause chain", () => {
    const err = new MarshalError("server.port", new Error("boom"))

    expect(serializeError(err)).toMatchObject({
      name: "MarshalError",
      code: "marshal_failed",
      message: "failed to marshal field server.port: boom",
      context: { path: "server.port" },
      cause: { name: "Error", code: "unknown", message: "boom" },
    })
  })

  it("describe non-error causes", () => {
    expect(DocumentError.parseFailed("bad input").message).toBe("failed to unmarshal config data: bad input")
  })
})
