import type { Logger } from "@flagini/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import { MemoryFlagRegistry } from "../../../adapters/memory/memory-flag-registry"
import type { Directive } from "../../../ports/directive"
import type { SetResult } from "../../../ports/flag-registry"
import { SetValueError, UnknownFlagError } from "../../errors"
import { ShorthandRegistry } from "../../shorthands/shorthand-registry"
import { MergeEngine, type PlanOptions } from "../merge-engine"

function directive(key: string, value: string, lineNumber = 1): Directive {
  return Object.freeze({ key, value, sourcePath: "app.ini", lineNumber, comment: "" })
}

class FlakyRegistry extends MemoryFlagRegistry {
  override set(name: string, value: string): SetResult {
    if (value === "boom") return { kind: "rejected", reason: "storage refused" }

    return super.set(name, value)
  }
}

describe("MergeEngine", () => {
  let registry: MemoryFlagRegistry
  let shorthands: ShorthandRegistry
  let logger: MockProxy<Logger>
  let engine: MergeEngine

  const strict: PlanOptions = { commandLineFlags: new Set(), allowUnknownFlags: false }

  beforeEach(() => {
    registry = new MemoryFlagRegistry()
    registry.string("addr", ":80", "Listen address")
    registry.integer("port", 80, "Port")
    registry.string("version", "1.0", "Version")

    shorthands = new ShorthandRegistry(registry)
    logger = mock<Logger>()
    engine = new MergeEngine({ registry, shorthands, logger })
  })

  function merge(directives: Directive[], options: PlanOptions = strict) {
    return engine.commit(engine.plan(directives, options))
  }

  it("applies directives and reports previous values", () => {
    const changes = merge([directive("addr", ":9000")])

    expect(registry.lookup("addr")?.value).toBe(":9000")
    expect([...changes]).toEqual([["addr", ":80"]])
  })

  it("lets a later directive override an earlier one", () => {
    merge([directive("addr", ":1"), directive("addr", ":2")])

    expect(registry.lookup("addr")?.value).toBe(":2")
  })

  it("never overrides a flag given on the command line", () => {
    registry.parseArgs(["-addr=:9000"])

    const changes = merge([directive("addr", ":1")], {
      commandLineFlags: registry.explicitlySet(),
      allowUnknownFlags: false,
    })

    expect(changes.size).toBe(0)
    expect(registry.lookup("addr")?.value).toBe(":9000")
  })

  it("yields an empty change set when the same source is merged again", () => {
    const source = [directive("addr", ":9000"), directive("port", "8080")]

    expect(merge(source).size).toBe(2)
    expect(merge(source).size).toBe(0)
  })

  it("reports no change when the canonical value is unchanged", () => {
    expect(merge([directive("port", "+80")]).size).toBe(0)
  })

  it("skips validation for values equal to the current one", () => {
    const validate = vi.spyOn(registry, "validate")

    merge([directive("addr", ":80")])

    expect(validate).not.toHaveBeenCalled()
  })

  it("resolves shorthand keys to their flag", () => {
    shorthands.register("v", "version")

    merge([directive("v", "2.0")])

    expect(registry.lookup("version")?.value).toBe("2.0")
  })

  it("fails on unknown keys and logs them", () => {
    expect(() => engine.plan([directive("mystery", "1", 4)], strict)).toThrow(UnknownFlagError)
    expect(logger.warn).toHaveBeenCalledWith("Unknown flag in config", {
      flag: "mystery",
      source: "app.ini",
      line: 4,
    })
  })

  it("skips unknown keys when allowUnknownFlags is set", () => {
    const changes = merge([directive("mystery", "1"), directive("addr", ":1")], {
      commandLineFlags: new Set(),
      allowUnknownFlags: true,
    })

    expect([...changes.keys()]).toEqual(["addr"])
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })

  it("leaves the registry untouched when any directive is invalid", () => {
    expect(() =>
      engine.plan([directive("addr", ":1"), directive("port", "not-a-port", 2)], strict),
    ).toThrow(SetValueError)

    expect(registry.lookup("addr")?.value).toBe(":80")
    expect(registry.lookup("port")?.value).toBe("80")
  })

  it("throws the first issue after logging all of them", () => {
    const plan = () =>
      engine.plan([directive("mystery", "1", 1), directive("port", "x", 2)], strict)

    expect(plan).toThrow(UnknownFlagError)
    expect(logger.warn).toHaveBeenCalledTimes(2)
  })

  it("restores earlier writes when the registry refuses one", () => {
    const flaky = new FlakyRegistry()
    flaky.string("a", "old-a", "")
    flaky.string("b", "old-b", "")

    const flakyEngine = new MergeEngine({ registry: flaky, shorthands, logger })
    const plan = flakyEngine.plan([directive("a", "new-a"), directive("b", "boom")], strict)

    expect(() => flakyEngine.commit(plan)).toThrow(SetValueError)
    expect(flaky.lookup("a")?.value).toBe("old-a")
    expect(flaky.lookup("b")?.value).toBe("old-b")
  })
})
