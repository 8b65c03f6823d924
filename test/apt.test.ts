import { describe, it, expect } from "vitest"
import { Apt, AptManager } from "../src/manager/managers/apt"
import { FakeExecutor } from "./helpers/executor"

const SEARCH_OUTPUT = `Sorting...
Full Text Search...
htop/jammy,now 3.0.5-7build2 amd64 [installed]
  interactive processes viewer

btop/jammy 1.2.3-2 amd64
  Modern and colorful command line resource monitor
  that shows usage and stats
`

const SHOW_OUTPUT = `Package: htop
Version: 3.0.5-7build2
Priority: optional
Description: interactive processes viewer
`

function partialFailure() {
  return new FakeExecutor()
    .on("apt install", { exitCode: 100, stderr: "E: Unable to locate package bogus-pkg\n" })
    .on(/^dpkg-query .* real-pkg /, { stdout: "install ok installed" })
    .on(/^dpkg-query .* bogus-pkg /, { exitCode: 1 })
}

describe("Apt parsers", () => {
  it("parses search results with descriptions and installed markers", () => {
    expect(Apt.parseSearch(SEARCH_OUTPUT)).toEqual([
      {
        name: "htop",
        version: "3.0.5-7build2",
        description: "interactive processes viewer",
        installed: true,
        available: true,
      },
      {
        name: "btop",
        version: "1.2.3-2",
        description: "Modern and colorful command line resource monitor",
        installed: false,
        available: true,
      },
    ])
  })

  it("parses show output", () => {
    expect(Apt.parseInfo(SHOW_OUTPUT)).toEqual({ version: "3.0.5-7build2", description: "interactive processes viewer" })
  })

  it("classifies progress output", () => {
    expect(Apt.parseOutput("Unpacking htop (3.0.5-7build2) ...")).toEqual({
      progress: null,
      currentAction: "Unpacking packages",
    })
    expect(Apt.parseOutput("Progress: [42%]").progress).toBe(42)
    expect(Apt.parseOutput("Reading package lists... Done").currentAction).toBe("Reading package lists")
    expect(Apt.parseOutput("The following NEW packages will be installed:").currentAction).toBe(
      "Calculating packages to install",
    )
    expect(Apt.parseOutput("Fetched 128 kB in 1s (150 kB/s)").currentAction).toBe("Downloading packages")
  })

  it("returns a neutral result for unknown text", () => {
    expect(Apt.parseOutput("")).toEqual({ progress: null, currentAction: "" })
    expect(Apt.parseOutput("something else entirely")).toEqual({ progress: null, currentAction: "" })
  })

  it("explains install errors", () => {
    expect(Apt.explain("E: Unable to locate package foo", "foo")).toBe("Package 'foo' not found in repositories")
    expect(Apt.explain("E: Unmet dependencies. Try 'apt --fix-broken install'", "foo")).toBe("Unmet dependencies")
    expect(Apt.explain("E: Package 'foo' has no installation candidate", "foo")).toBe(
      "No installation candidate available",
    )
    expect(Apt.explain("W: something\nE: Could not get lock /var/lib/dpkg/lock", "foo")).toBe(
      "Could not get lock /var/lib/dpkg/lock",
    )
    expect(Apt.explain("", "foo")).toBe("Installation failed")
  })
})

describe("AptManager", () => {
  it("partitions a partially failed install by asking dpkg", async () => {
    const executor = partialFailure()
    const apt = new AptManager({ executor })

    const result = await apt.installPackages(["real-pkg", "bogus-pkg"])

    expect(result.success).toBe(false)
    expect(result.allSuccessful).toBe(false)
    expect(result.packagesInstalled).toEqual(["real-pkg"])
    expect(result.packagesFailed).toEqual(["bogus-pkg"])
    expect(result.errors).toEqual({ "bogus-pkg": "Package 'bogus-pkg' not found in repositories" })
    expect(executor.commands()).toEqual([
      "apt update",
      "apt install -y real-pkg bogus-pkg",
      "dpkg-query -W -f='${Status}' real-pkg 2>/dev/null",
      "dpkg-query -W -f='${Status}' bogus-pkg 2>/dev/null",
    ])
  })

  it("runs the cache refresh and install elevated with their timeouts", async () => {
    const executor = new FakeExecutor()
    await new AptManager({ executor, timeouts: { install: 1_000 } }).installPackages(["htop"])
    expect(executor.calls.map((c) => [c.command, c.opts.sudo, c.opts.timeout])).toEqual([
      ["apt update", true, 300_000],
      ["apt install -y htop", true, 1_000],
    ])
  })

  it("refreshes the cache only once per instance", async () => {
    const executor = new FakeExecutor()
    const apt = new AptManager({ executor })
    await apt.installPackages(["htop"])
    await apt.installPackages(["curl"])
    expect(executor.count("apt update")).toBe(1)
  })

  it("retries the refresh after a failed one and still installs", async () => {
    const executor = new FakeExecutor().on("apt update", { exitCode: 100 })
    const apt = new AptManager({ executor })
    const first = await apt.installPackages(["htop"])
    await apt.installPackages(["curl"])
    expect(first.allSuccessful).toBe(true)
    expect(executor.count("apt update")).toBe(2)
  })

  it("refuses invalid names and collapses duplicates", async () => {
    const executor = new FakeExecutor()
    const result = await new AptManager({ executor }).installPackages(["htop", "htop", "x; rm -rf ~"])
    expect(executor.commands()).toContain("apt install -y htop")
    expect(result.packagesInstalled).toEqual(["htop"])
    expect(result.packagesFailed).toEqual(["x; rm -rf ~"])
    expect(result.errors).toEqual({ "x; rm -rf ~": "Invalid package name" })
    expect(result.success).toBe(false)
  })

  it("reports progress lines to the caller", async () => {
    const executor = new FakeExecutor().on("apt install", { stdout: "Unpacking htop\nSetting up htop\n" })
    const lines: string[] = []
    await new AptManager({ executor }).installPackages(["htop"], (l) => lines.push(l))
    expect(lines).toEqual(["Updating package cache...", "Unpacking htop", "Setting up htop"])
  })

  it("checks the local database unprivileged", async () => {
    const executor = new FakeExecutor().on("dpkg-query", { stdout: "deinstall ok config-files" })
    const apt = new AptManager({ executor })
    expect(await apt.isPackageInstalled("htop")).toBe(false)
    expect(executor.calls[0]?.opts.sudo).toBeUndefined()
  })

  it("searches with a quoted query", async () => {
    const executor = new FakeExecutor().on("apt search", { stdout: SEARCH_OUTPUT })
    const found = await new AptManager({ executor }).searchPackage("process viewer")
    expect(found.map((p) => p.name)).toEqual(["htop", "btop"])
    expect(executor.commands()).toEqual(["apt search 'process viewer'"])
  })

  it("gets package info", async () => {
    const executor = new FakeExecutor()
      .on("apt show", { stdout: SHOW_OUTPUT })
      .on("dpkg-query", { stdout: "install ok installed" })
    expect(await new AptManager({ executor }).getPackageInfo("htop")).toEqual({
      name: "htop",
      version: "3.0.5-7build2",
      description: "interactive processes viewer",
      installed: true,
      available: true,
    })
  })

  it("returns null for unknown packages", async () => {
    const executor = new FakeExecutor().on("apt show", { exitCode: 100, stderr: "E: No packages found" })
    expect(await new AptManager({ executor }).getPackageInfo("nope")).toBeNull()
  })

  it("does not upgrade when the refresh fails", async () => {
    const executor = new FakeExecutor().on("apt update", { exitCode: 100 })
    expect(await new AptManager({ executor }).upgradeSystem()).toBe(false)
    expect(executor.commands()).toEqual(["apt update"])
  })

  it("upgrades after a refresh", async () => {
    const executor = new FakeExecutor()
    expect(await new AptManager({ executor }).upgradeSystem()).toBe(true)
    expect(executor.calls.map((c) => [c.command, c.opts.timeout])).toEqual([
      ["apt update", 300_000],
      ["apt full-upgrade -y", 3_600_000],
    ])
  })

  it("exposes the interactive commands", () => {
    const apt = new AptManager({ executor: new FakeExecutor() })
    expect(apt.installCommand(["htop", "curl"])).toBe("apt install htop curl")
    expect(apt.upgradeCommands()).toEqual(["apt update", "apt full-upgrade"])
  })
})
