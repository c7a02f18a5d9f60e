import { MemoryFlagRegistry } from "../../../adapters/memory/memory-flag-registry"
import { RegistrationError } from "../../errors"
import { ShorthandRegistry } from "../shorthand-registry"

describe("ShorthandRegistry", () => {
  let flags: MemoryFlagRegistry
  let shorthands: ShorthandRegistry

  beforeEach(() => {
    flags = new MemoryFlagRegistry()
    flags.string("version", "1.0", "Version")
    flags.integer("port", 80, "Port")
    shorthands = new ShorthandRegistry(flags)
  })

  describe("registration", () => {
    it("resolves a registered alias", () => {
      shorthands.register("p", "port")

      expect(shorthands.resolve("p")).toBe("port")
      expect(shorthands.resolve("q")).toBeUndefined()
    })

    it("rejects an alias for an unknown flag", () => {
      expect(() => shorthands.register("x", "missing")).toThrow(RegistrationError)
    })

    it("rejects an alias that is already taken", () => {
      shorthands.register("p", "port")

      expect(() => shorthands.register("p", "version")).toThrow(
        "Shorthand p is already registered for flag port",
      )
    })

    it("rejects an alias that is a flag name", () => {
      expect(() => shorthands.register("version", "port")).toThrow(
        "Shorthand version is already a flag name",
      )
    })

    it("rejects registration once sealed", () => {
      shorthands.seal()

      expect(() => shorthands.registerCommandLine("v", "version")).toThrow(
        "registerCommandLineShorthand() must be called before parse()",
      )
    })
  })

  describe("rewriteArgs", () => {
    beforeEach(() => {
      shorthands.registerCommandLine("v", "version")
      shorthands.register("p", "port")
    })

    it("rewrites -alias=value", () => {
      expect(shorthands.rewriteArgs(["-v=2.0"])).toEqual(["-version=2.0"])
    })

    it("carries the next token along for a bare alias", () => {
      expect(shorthands.rewriteArgs(["-v", "2.0", "rest"])).toEqual(["-version", "2.0", "rest"])
    })

    it("does not swallow a following flag", () => {
      expect(shorthands.rewriteArgs(["-v", "-port=1"])).toEqual(["-version", "-port=1"])
    })

    it("passes config-only aliases, double dashes and plain words through", () => {
      const args = ["-p", "9", "--v=1", "-", "word"]

      expect(shorthands.rewriteArgs(args)).toEqual(args)
    })

    it("is equivalent to the full flag once parsed", () => {
      const viaAlias = new MemoryFlagRegistry()
      viaAlias.string("version", "1.0", "")
      viaAlias.parseArgs(shorthands.rewriteArgs(["-v=2.0"]))

      const viaFull = new MemoryFlagRegistry()
      viaFull.string("version", "1.0", "")
      viaFull.parseArgs(["-version=2.0"])

      expect(viaAlias.lookup("version")).toEqual(viaFull.lookup("version"))
    })
  })

  describe("formatShorthandUsage", () => {
    it("is empty without shorthands", () => {
      expect(shorthands.formatShorthandUsage()).toBe("")
    })

    it("groups aliases per flag and aligns the columns", () => {
      shorthands.register("p", "port")
      shorthands.registerCommandLine("v", "version")
      shorthands.register("ver", "version")

      expect(shorthands.formatShorthandUsage()).toBe(
        "\nRegistered flag shorthands:\n" +
          "  -port     -[p]\n" +
          "  -version  -[v, ver] (command-line)\n",
      )
    })
  })
})
