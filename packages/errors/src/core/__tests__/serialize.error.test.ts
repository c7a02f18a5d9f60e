import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes every BaseError field", () => {
    const err = new BaseError("bad value", {
      code: "invalid_value",
      context: { flag: "port", value: "abc" },
      isOperational: false,
    })

    expect(serializeError(err)).toEqual({
      name: "BaseError",
      code: "invalid_value",
      message: "bad value",
      context: { flag: "port", value: "abc" },
      isOperational: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("omits cause and stack unless present or requested", () => {
    const serialized = serializeError(new BaseError("x", { code: "syntax_error" }))

    expect("cause" in serialized).toBe(false)
    expect("stack" in serialized).toBe(false)
  })

  it("includes stack when requested", () => {
    const serialized = serializeError(new BaseError("x", { code: "syntax_error" }), {
      includeStack: true,
    })

    expect(serialized.stack).toContain("BaseError")
  })

  it("walks the cause chain", () => {
    const root = new Error("ECONNREFUSED")
    const middle = new BaseError("fetch failed", { code: "fetch_failed", cause: root })
    const outer = new BaseError("import failed", { code: "import_failed", cause: middle })

    const serialized = serializeError(outer)

    expect(serialized.cause?.code).toBe("fetch_failed")
    expect(serialized.cause?.cause?.code).toBe("unknown")
    expect(serialized.cause?.cause?.message).toBe("ECONNREFUSED")
  })

  it("serializes plain errors as non-operational", () => {
    expect(serializeError(new TypeError("boom"))).toEqual({
      name: "TypeError",
      code: "unknown",
      message: "boom",
      context: {},
      isOperational: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("wraps non-error values", () => {
    expect(serializeError("plain string")).toMatchObject({
      name: "NonErrorThrown",
      message: "plain string",
      context: { value: "plain string" },
    })
    expect(serializeError(42)).toMatchObject({
      message: "Unknown error",
      context: { value: 42 },
    })
  })
})
