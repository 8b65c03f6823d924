import { describe, it, expect, beforeEach } from "vitest"
import { Registry } from "../src/manager/registry"
import { AptManager } from "../src/manager/managers/apt"
import { ZypperManager } from "../src/manager/managers/zypper"
import { FakeExecutor } from "./helpers/executor"

describe("Registry", () => {
  beforeEach(() => {
    Registry.clear()
  })

  it("registers the built-in backends", () => {
    Registry.registerBuiltins()
    expect(Registry.names()).toEqual(["apt", "dnf", "pacman", "zypper"])
    expect(Registry.has("apt")).toBe(true)
    expect(Registry.has("emerge")).toBe(false)
  })

  it("creates a fresh adapter per call", () => {
    Registry.registerBuiltins()
    const executor = new FakeExecutor()
    const a = Registry.create("apt", { executor })
    const b = Registry.create("apt", { executor })
    expect(a).toBeInstanceOf(AptManager)
    expect(a).not.toBe(b)
    expect(Registry.create("zypper", { executor })).toBeInstanceOf(ZypperManager)
  })

  it("returns undefined for unknown names", () => {
    expect(Registry.create("apt", { executor: new FakeExecutor() })).toBeUndefined()
  })

  it("accepts custom backends and replaces on re-register", () => {
    Registry.registerBuiltins()
    Registry.register("apt", (opts) => new ZypperManager(opts))
    expect(Registry.create("apt", { executor: new FakeExecutor() })?.name).toBe("zypper")
    expect(Registry.names()).toHaveLength(4)
  })
})
