import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("creates error with required fields", () => {
      const err = new BaseError("error setting field for APP_PORT", { code: "field_binding" })

      expect(err.message).toBe("error setting field for APP_PORT")
      expect(err.code).toBe("field_binding")
    })

    it("sets name to constructor name", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.name).toBe("BaseError")
    })

    it("uses the subclass name when extended", () => {
      class MissingFileError extends BaseError<"missing_file"> {}

      const err = new MissingFileError("no such file", { code: "missing_file" })

      expect(err.name).toBe("MissingFileError")
      expect(err).toBeInstanceOf(BaseError)
    })

    it("defaults context to an empty frozen object", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults isOperational to true", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isOperational).toBe(true)
    })

    it("sets timestamp to current time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("copies and freezes the provided context", () => {
      const context = { path: "server.port", key: "APP_SERVER_PORT" }
      const err = new BaseError("test", { code: "test", context })

      expect(err.context).toEqual({ path: "server.port", key: "APP_SERVER_PORT" })
      expect(err.context).not.toBe(context)
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("root cause")
      const err = new BaseError("wrapped", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })

    it("has no cause property when none is given", () => {
      const err = new BaseError("test", { code: "test" })

      expect("cause" in err).toBe(false)
    })

    it("accepts isOperational", () => {
      const err = new BaseError("invariant", { code: "bug", isOperational: false })

      expect(err.isOperational).toBe(false)
    })

    it("has a stack trace", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.stack).toContain("BaseError")
    })
  })

  describe("type safety", () => {
    it("preserves generic code type", () => {
      type ParseCode = "invalid_syntax" | "out_of_range"
      const err = new BaseError<ParseCode>("value out of range", { code: "out_of_range" })

      const code: ParseCode = err.code
      expect(code).toBe("out_of_range")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new BaseError("bad value", {
        code: "invalid_value",
        context: { kind: "int" },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "invalid_value",
        message: "bad value",
        context: { kind: "int" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("is used by JSON.stringify", () => {
      const err = new BaseError("bad value", { code: "invalid_value" })

      expect(JSON.parse(JSON.stringify(err))).toEqual({
        name: "BaseError",
        code: "invalid_value",
        message: "bad value",
        context: {},
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
