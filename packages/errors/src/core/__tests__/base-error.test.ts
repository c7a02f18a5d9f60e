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
    it("keeps message and code", () => {
      const err = new BaseError("cannot read config", { code: "fetch_failed" })

      expect(err.message).toBe("cannot read config")
      expect(err.code).toBe("fetch_failed")
    })

    it("uses the subclass name", () => {
      class ReloadError extends BaseError<"reload_failed"> {}

      const err = new ReloadError("reload failed", { code: "reload_failed" })

      expect(err.name).toBe("ReloadError")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
    })

    it("applies defaults", () => {
      const err = new BaseError("x", { code: "syntax_error" })

      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("freezes a copy of the context", () => {
      const context = { source: "app.ini", line: 3 }
      const err = new BaseError("x", { code: "syntax_error", context })

      context.line = 4

      expect(err.context).toEqual({ source: "app.ini", line: 3 })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps cause and flags", () => {
      const cause = new Error("socket hang up")
      const err = new BaseError("fetch failed", {
        code: "fetch_failed",
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("has a stack trace naming the class", () => {
      const err = new BaseError("x", { code: "syntax_error" })

      expect(err.stack).toContain("BaseError")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized form", () => {
      const err = new BaseError("unknown flag", {
        code: "unknown_flag",
        context: { flag: "verbose" },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "unknown_flag",
        message: "unknown flag",
        context: { flag: "verbose" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
