import { describe, it, expect } from "vitest"
import { Apps } from "../src/installer/apps"
import { AptManager } from "../src/manager/managers/apt"
import { AppEntry } from "../src/config/schema"
import type { Catalog } from "../src/config/catalog"
import { FakeExecutor } from "./helpers/executor"

function app(raw: unknown, category = "Test"): Catalog.App {
  return { ...AppEntry.parse(raw), category }
}

const HTOP = app({ id: "htop", name: "htop", install: { apt: { packages: ["htop"] } } })
const BOGUS = app({ id: "bogus", name: "Bogus", install: { apt: { packages: ["bogus-pkg"] } } })
const VSCODIUM = app({ id: "vscodium", name: "VSCodium", install: { flatpak: { packages: ["com.vscodium.codium"] } } })
const CHROME = app({
  id: "chrome",
  name: "Chrome",
  install: { apt: { method: "custom", sudo: true, commands: ["fetch-chrome", "install-chrome"] } },
})
const DNF_ONLY = app({ id: "dnf-only", name: "DNF only", install: { dnf: { packages: ["thing"] } } })

function context(executor: FakeExecutor, statuses: string[] = []): Apps.Context {
  return {
    adapter: new AptManager({ executor }),
    executor,
    packageManager: "apt",
    flatpakRemote: "flathub",
    timeout: 5_000,
    onStatus: (m) => statuses.push(m),
  }
}

describe("Apps.plan", () => {
  it("prefers the native entry, then flatpak, else skips", () => {
    expect(Apps.plan(HTOP, "apt")).toEqual({ kind: "native", app: HTOP, packages: ["htop"] })
    expect(Apps.plan(VSCODIUM, "apt")).toEqual({ kind: "flatpak", app: VSCODIUM, ids: ["com.vscodium.codium"] })
    expect(Apps.plan(CHROME, "apt").kind).toBe("custom")
    expect(Apps.plan(DNF_ONLY, "apt")).toEqual({ kind: "skip", app: DNF_ONLY })
    expect(Apps.plan(CHROME, "dnf")).toEqual({ kind: "skip", app: CHROME })
  })

  it("skips methods with nothing to run", () => {
    const empty = app({ id: "e", name: "E", install: { apt: { packages: [] } } })
    expect(Apps.plan(empty, "apt").kind).toBe("skip")
  })
})

describe("Apps.install", () => {
  it("installs what it can and reports each app", async () => {
    const executor = new FakeExecutor()
      .on("apt install -y", { exitCode: 100, stderr: "E: Unable to locate package bogus-pkg\n" })
      .on(/^dpkg-query .* htop /, { stdout: "install ok installed" })
      .on(/^dpkg-query .* bogus-pkg /, { exitCode: 1 })
      .on("fetch-chrome", { exitCode: 1, stderr: "boom\n" })

    const result = await Apps.install([HTOP, BOGUS, VSCODIUM, CHROME, DNF_ONLY], context(executor))

    expect(result.installed).toEqual(["htop", "vscodium"])
    expect(result.skipped).toEqual(["dnf-only"])
    expect(result.failed).toEqual({
      bogus: "bogus-pkg: Package 'bogus-pkg' not found in repositories",
      chrome: "boom",
    })
    expect(result.packages?.packagesInstalled).toEqual(["htop"])
    expect(executor.commands()).toEqual([
      "apt update",
      "apt install -y htop bogus-pkg",
      "dpkg-query -W -f='${Status}' htop 2>/dev/null",
      "dpkg-query -W -f='${Status}' bogus-pkg 2>/dev/null",
      "flatpak install -y --noninteractive 'flathub' com.vscodium.codium",
      "fetch-chrome",
    ])
  })

  it("runs flatpak elevated and custom commands with their own sudo flag", async () => {
    const executor = new FakeExecutor()
    const plain = app({ id: "plain", name: "Plain", install: { apt: { method: "custom", commands: ["echo hi"] } } })
    const statuses: string[] = []

    const result = await Apps.install([VSCODIUM, plain, CHROME], context(executor, statuses))

    expect(result.installed).toEqual(["vscodium", "plain", "chrome"])
    expect(executor.calls.map((c) => [c.command, c.opts.sudo, c.opts.timeout])).toEqual([
      ["flatpak install -y --noninteractive 'flathub' com.vscodium.codium", true, 5_000],
      ["echo hi", false, 5_000],
      ["fetch-chrome", true, 5_000],
      ["install-chrome", true, 5_000],
    ])
    expect(statuses).toEqual([
      "Installing VSCodium from flathub...",
      "Running 1 command(s) for Plain...",
      "Running 2 command(s) for Chrome...",
    ])
  })

  it("refuses invalid flatpak ids without running anything", async () => {
    const executor = new FakeExecutor()
    const evil = app({ id: "evil", name: "Evil", install: { flatpak: { packages: ["org.x; reboot"] } } })
    const result = await Apps.install([evil], context(executor))
    expect(result.failed).toEqual({ evil: "org.x; reboot: Invalid package name" })
    expect(executor.calls).toEqual([])
  })

  it("reports a timed out flatpak install", async () => {
    const executor = new FakeExecutor().on("flatpak", { exitCode: -1, status: "timeout", stderr: "partial" })
    const result = await Apps.install([VSCODIUM], context(executor))
    expect(result.failed).toEqual({ vscodium: "Timed out" })
  })
})

describe("Apps.commands", () => {
  it("lists the native command first, then flatpak and custom steps", () => {
    const adapter = new AptManager({ executor: new FakeExecutor() })
    const steps = Apps.commands([CHROME, HTOP, VSCODIUM, BOGUS, DNF_ONLY], {
      adapter,
      packageManager: "apt",
      flatpakRemote: "flathub",
    })
    expect(steps).toEqual([
      { command: "apt install htop bogus-pkg", sudo: true },
      { command: "fetch-chrome", sudo: true },
      { command: "install-chrome", sudo: true },
      { command: "flatpak install -y --noninteractive 'flathub' com.vscodium.codium", sudo: true },
    ])
  })
})

describe("Apps.reason", () => {
  it("summarises a failed command", () => {
    expect(Apps.reason("  nope  \n", "failed", 2)).toBe("nope")
    expect(Apps.reason("", "failed", 2)).toBe("Exited with code 2")
    expect(Apps.reason("x".repeat(150), "failed", 1)).toBe("x".repeat(100))
    expect(Apps.reason("ignored", "timeout", -1)).toBe("Timed out")
    expect(Apps.reason("Cancelled before start", "cancelled", -1)).toBe("Cancelled")
  })
})
