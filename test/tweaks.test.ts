import { describe, it, expect } from "vitest"
import { Tweaks } from "../src/installer/tweaks"
import { TweakEntry } from "../src/config/schema"
import type { Catalog } from "../src/config/catalog"
import { FakeExecutor } from "./helpers/executor"

function tweak(raw: unknown, section = "System"): Catalog.Tweak {
  return { ...TweakEntry.parse(raw), section }
}

const SWAPPINESS = tweak({
  id: "swappiness",
  name: "Lower swappiness",
  commands: [{ command: "write-sysctl", description: "Writing sysctl drop-in" }, { command: "apply-sysctl" }],
  verification: { check_command: "read-swappiness", success_regex: "^10$" },
})

describe("Tweaks.isApplied", () => {
  it("matches the check output line by line", async () => {
    const executor = new FakeExecutor().on("read-swappiness", { stdout: "60\n10\n" })
    expect(await Tweaks.isApplied(SWAPPINESS, executor)).toBe(true)
    expect(executor.calls[0]?.opts.sudo).toBeUndefined()
  })

  it("is false when the output does not match", async () => {
    const executor = new FakeExecutor().on("read-swappiness", { stdout: "100\n" })
    expect(await Tweaks.isApplied(SWAPPINESS, executor)).toBe(false)
  })

  it("never checks tweaks that are not idempotent or have no verification", async () => {
    const executor = new FakeExecutor()
    const once = tweak({ ...SWAPPINESS, idempotent: false })
    const unchecked = tweak({ id: "x", name: "X", commands: [{ command: "true" }] })
    expect(await Tweaks.isApplied(once, executor)).toBe(false)
    expect(await Tweaks.isApplied(unchecked, executor)).toBe(false)
    expect(executor.calls).toEqual([])
  })
})

describe("Tweaks.apply", () => {
  it("applies, skips and fails tweaks independently", async () => {
    const executor = new FakeExecutor()
      .on("read-swappiness", { stdout: "10\n" })
      .on("disable-apport", { exitCode: 1, stderr: "Unit apport.service not found.\n" })
    const apport = tweak({
      id: "disable-apport",
      name: "Disable crash reporter",
      commands: [{ command: "disable-apport" }, { command: "never-reached" }],
    })
    const snap = tweak({
      id: "remove-snap-firefox",
      name: "Replace snap Firefox",
      idempotent: false,
      requires_restart: true,
      commands: [{ command: "snap remove firefox" }],
    })
    const statuses: string[] = []

    const result = await Tweaks.apply([SWAPPINESS, apport, snap], {
      executor,
      timeout: 1_000,
      onStatus: (m) => statuses.push(m),
    })

    expect(result).toEqual({
      applied: ["remove-snap-firefox"],
      skipped: ["swappiness"],
      failed: { "disable-apport": "Unit apport.service not found." },
      requiresRestart: true,
    })
    expect(executor.commands()).toEqual(["read-swappiness", "disable-apport", "snap remove firefox"])
    expect(statuses).toEqual([
      "[1/3] Applying: Lower swappiness...",
      "Skipped: Lower swappiness (already applied)",
      "[2/3] Applying: Disable crash reporter...",
      "Failed: Disable crash reporter - Unit apport.service not found.",
      "[3/3] Applying: Replace snap Firefox...",
      "Applied: Replace snap Firefox",
    ])
  })

  it("runs every step elevated with the timeout", async () => {
    const executor = new FakeExecutor().on("read-swappiness", { stdout: "60\n" })
    const statuses: string[] = []
    const result = await Tweaks.apply([SWAPPINESS], { executor, timeout: 1_000, onStatus: (m) => statuses.push(m) })
    expect(result.applied).toEqual(["swappiness"])
    expect(result.requiresRestart).toBe(false)
    expect(executor.calls.slice(1).map((c) => [c.command, c.opts.sudo, c.opts.timeout])).toEqual([
      ["write-sysctl", true, 1_000],
      ["apply-sysctl", true, 1_000],
    ])
    expect(statuses).toContain("  Writing sysctl drop-in...")
  })
})
