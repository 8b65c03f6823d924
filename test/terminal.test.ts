import { describe, it, expect } from "vitest"
import { Terminal } from "../src/executor/terminal"

const BANNER = "=".repeat(35)

function fakeIo(answer: string | null) {
  const printed: string[] = []
  const asked: string[] = []
  const io: Terminal.Io = {
    ask: async (question) => {
      asked.push(question)
      return answer
    },
    print: (text) => {
      printed.push(text)
    },
  }
  return { io, printed, asked }
}

describe("Terminal.script", () => {
  it("builds a fail-fast script with banners and a final keypress", () => {
    const script = Terminal.script(["apt update", "sudo apt full-upgrade"], { sudo: true, description: "System upgrade" })
    expect(script.split("\n")).toEqual([
      "set -e",
      `echo '${BANNER}'`,
      "echo 'System upgrade'",
      `echo '${BANNER}'`,
      "echo ''",
      "sudo apt update",
      "sudo apt full-upgrade",
      "echo ''",
      `echo '${BANNER}'`,
      "echo 'Operation completed!'",
      `echo '${BANNER}'`,
      "echo ''",
      "read -r -p 'Press Enter to continue...' _",
    ])
  })

  it("leaves commands alone without sudo and skips the description banner", () => {
    const lines = Terminal.script(["flatpak update"]).split("\n")
    expect(lines.slice(0, 2)).toEqual(["set -e", "flatpak update"])
  })

  it("quotes the description", () => {
    const lines = Terminal.script(["true"], { description: "Bob's setup" }).split("\n")
    expect(lines[2]).toBe("echo 'Bob'\\''s setup'")
  })
})

describe("Terminal.elevated", () => {
  it("adds sudo only once", () => {
    expect(Terminal.elevated("apt update", true)).toBe("sudo apt update")
    expect(Terminal.elevated("sudo apt update", true)).toBe("sudo apt update")
    expect(Terminal.elevated("apt update", false)).toBe("apt update")
  })
})

describe("Terminal.confirm", () => {
  it("treats a declined confirmation as a successful no-op", async () => {
    const { io, printed, asked } = fakeIo("n")
    const result = await Terminal.confirm(["touch /tmp/should-not-run"], { sudo: true, description: "Test" }, io)
    expect(result).toEqual({ code: 0, success: true })
    expect(asked).toEqual(["\nContinue? [y/N]: "])
    expect(printed).toContain("  1. sudo touch /tmp/should-not-run")
    expect(printed[printed.length - 1]).toBe("Operation cancelled.")
  })

  it("declines on an empty answer", async () => {
    const { io } = fakeIo("")
    expect(await Terminal.confirm(["false"], {}, io)).toEqual({ code: 0, success: true })
  })

  it("reports an interrupt at the prompt as cancelled", async () => {
    const { io, printed } = fakeIo(null)
    const result = await Terminal.confirm(["false"], {}, io)
    expect(result).toEqual({ code: Terminal.CANCELLED, success: false })
    expect(printed[printed.length - 1]).toBe("\n\nOperation cancelled.")
  })

  it("runs the script after yes and returns its exit code", async () => {
    const { io } = fakeIo("YES")
    // exits before the final keypress
    const result = await Terminal.confirm(["exit 3"], {}, io)
    expect(result).toEqual({ code: 3, success: false })
  })
})
