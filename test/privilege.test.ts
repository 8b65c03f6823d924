import { describe, it, expect } from "vitest"
import { PrivilegeError, PrivilegeHandler } from "../src/executor/privilege"

function handler(tools: string[], codes: number[] = []) {
  const argvs: { argv: string[]; interactive: boolean }[] = []
  const privilege = new PrivilegeHandler({
    has: (cmd) => tools.includes(cmd),
    run: async (argv, interactive) => {
      argvs.push({ argv, interactive })
      return codes.shift() ?? 0
    },
  })
  return { privilege, argvs }
}

describe("PrivilegeHandler", () => {
  it("can elevate with sudo or pkexec", () => {
    expect(handler(["sudo"]).privilege.canElevate()).toBe(true)
    expect(handler(["pkexec"]).privilege.canElevate()).toBe(true)
    expect(handler([]).privilege.canElevate()).toBe(false)
  })

  it("checks sudo non-interactively and caches a success", async () => {
    const { privilege, argvs } = handler(["sudo"], [0])
    expect(await privilege.checkPrivileges()).toBe(true)
    expect(privilege.cached).toBe(true)
    expect(argvs).toEqual([{ argv: ["sudo", "-n", "true"], interactive: false }])
  })

  it("reports not elevated when the check fails", async () => {
    const { privilege } = handler(["sudo"], [1])
    expect(await privilege.checkPrivileges()).toBe(false)
    expect(privilege.cached).toBe(false)
  })

  it("reports not elevated when the check cannot run", async () => {
    const privilege = new PrivilegeHandler({
      has: () => true,
      run: async () => {
        throw new Error("spawn sudo EACCES")
      },
    })
    expect(await privilege.checkPrivileges()).toBe(false)
  })

  it("does not check without sudo", async () => {
    const { privilege, argvs } = handler(["pkexec"])
    expect(await privilege.checkPrivileges()).toBe(false)
    expect(argvs).toEqual([])
  })

  it("requests elevation interactively through sudo", async () => {
    const { privilege, argvs } = handler(["sudo", "pkexec"], [0])
    expect(await privilege.requestElevation()).toBe(true)
    expect(privilege.cached).toBe(true)
    expect(argvs).toEqual([{ argv: ["sudo", "-v"], interactive: true }])
  })

  it("falls back to pkexec", async () => {
    const { privilege, argvs } = handler(["pkexec"], [0])
    await privilege.requestElevation()
    expect(argvs.map((a) => a.argv)).toEqual([["pkexec", "true"]])
  })

  it("fails without any elevation tool", async () => {
    const { privilege } = handler([])
    await expect(privilege.requestElevation()).rejects.toThrow(
      new PrivilegeError("No privilege elevation tool found (sudo/pkexec)"),
    )
  })

  it("fails when the request is denied", async () => {
    const { privilege } = handler(["sudo"], [1])
    await expect(privilege.requestElevation()).rejects.toThrow("Privilege elevation was denied")
    expect(privilege.cached).toBe(false)
  })

  it("ensure skips the request while sudo still has a timestamp", async () => {
    const { privilege, argvs } = handler(["sudo"], [0])
    await privilege.ensure()
    expect(argvs.map((a) => a.argv)).toEqual([["sudo", "-n", "true"]])
  })

  it("ensure asks sudo once the check fails", async () => {
    const { privilege, argvs } = handler(["sudo"], [1, 0])
    await privilege.ensure()
    expect(argvs.map((a) => a.argv)).toEqual([
      ["sudo", "-n", "true"],
      ["sudo", "-v"],
    ])
  })

  it("ensure leaves pkexec to prompt inside the wrapped command", async () => {
    const { privilege, argvs } = handler(["pkexec"])
    await privilege.ensure()
    expect(argvs).toEqual([])
  })

  it("ensure fails without any elevation tool", async () => {
    const { privilege, argvs } = handler([])
    await expect(privilege.ensure()).rejects.toBeInstanceOf(PrivilegeError)
    expect(argvs).toEqual([])
  })

  it("wraps commands with the non-interactive prefix", () => {
    const { privilege } = handler(["sudo"])
    expect(privilege.wrapCommand("apt install -y htop", true)).toBe("sudo -n apt install -y htop")
    expect(privilege.wrapCommand("apt install -y htop", false)).toBe("apt install -y htop")
    expect(privilege.wrapCommand("apt install -y htop")).toBe("apt install -y htop")
  })

  it("wraps through pkexec when sudo is missing", () => {
    const { privilege } = handler(["pkexec"])
    expect(privilege.wrapCommand("echo 'x' > /etc/y", true)).toBe("pkexec sh -c 'echo '\\''x'\\'' > /etc/y'")
  })

  it("leaves the command alone when nothing can elevate", () => {
    const { privilege } = handler([])
    expect(privilege.wrapCommand("apt update", true)).toBe("apt update")
  })
})
