import { BaseError } from "@flagini/errors"
import {
  ArgumentError,
  CyclicImportError,
  FetchError,
  RegistrationError,
  SetValueError,
  UnknownFlagError,
} from "../errors"

describe("config errors", () => {
  it("are BaseErrors carrying their code", () => {
    const err = UnknownFlagError.onCommandLine("nope")

    expect(err).toBeInstanceOf(BaseError)
    expect(err.name).toBe("UnknownFlagError")
    expect(err.code).toBe("unknown_flag")
    expect(err.message).toBe("Flag provided but not defined: -nope")
  })

  it("places directive errors in their source", () => {
    const err = SetValueError.rejected("workers", "lots", "expected an integer", {
      source: "app.ini",
      line: 3,
    })

    expect(err.message).toBe("Invalid value for flag workers at line 3 of app.ini: expected an integer")
    expect(err.context).toEqual({
      source: "app.ini",
      line: 3,
      flag: "workers",
      value: "lots",
      reason: "expected an integer",
    })
  })

  it("omits the position for command-line values", () => {
    expect(SetValueError.rejected("workers", "x", "bad").message).toBe(
      "Invalid value for flag workers: bad",
    )
  })

  it("records the import stack of a cycle", () => {
    const err = CyclicImportError.detected("a.ini", ["a.ini", "b.ini", "a.ini"])

    expect(err.context).toEqual({ source: "a.ini", stack: ["a.ini", "b.ini", "a.ini"] })
  })

  it("marks only transient fetch failures as retryable", () => {
    expect(FetchError.httpStatus("https://x.test/a.ini", 502).isRetryable).toBe(true)
    expect(FetchError.network("https://x.test/a.ini", new Error("reset")).isRetryable).toBe(true)
    expect(FetchError.unsecure("http://x.test/a.ini").isRetryable).toBe(false)
    expect(FetchError.unreadable("a.ini", new Error("ENOENT")).isRetryable).toBe(false)
  })

  it("marks programmer mistakes as non-operational", () => {
    expect(RegistrationError.afterParse("setConfigFile").isOperational).toBe(false)
    expect(ArgumentError.missingValue("addr").isOperational).toBe(true)
  })
})
