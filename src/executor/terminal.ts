import { spawn } from "child_process"
import { createInterface } from "readline"
import chalk from "chalk"
import { Shell } from "./shell"
import { Log } from "../util/log"

/**
 * Interactive execution: the commands own the terminal, so the user sees
 * native prompts (sudo password, package manager confirmations) and answers
 * them. Nothing is captured or parsed; only the exit code comes back.
 */
export namespace Terminal {
  /** Exit code reported when the user interrupts with Ctrl+C */
  export const CANCELLED = 130

  export interface Result {
    code: number
    success: boolean
  }

  export interface Options {
    sudo?: boolean
    description?: string
    warning?: string
  }

  /** Console access, swappable so the confirmation flow can run without a TTY */
  export interface Io {
    /** Resolves with the answer, or null when the user interrupted */
    ask(question: string): Promise<string | null>
    print(text: string): void
  }

  export const consoleIo: Io = {
    ask(question) {
      const rl = createInterface({ input: process.stdin, output: process.stdout })
      return new Promise((resolve) => {
        let answered = false
        rl.on("SIGINT", () => rl.close())
        rl.once("close", () => {
          if (!answered) resolve(null)
        })
        rl.question(question, (answer) => {
          answered = true
          rl.close()
          resolve(answer)
        })
      })
    },
    print(text) {
      console.log(text)
    },
  }

  const BANNER = "==================================="

  export function fromCode(code: number): Result {
    return { code, success: code === 0 }
  }

  /** A command as it will run: prefixed with sudo unless it already is */
  export function elevated(command: string, sudo: boolean): string {
    const trimmed = command.trim()
    if (!sudo || trimmed === "sudo" || trimmed.startsWith("sudo ")) return command
    return `sudo ${command}`
  }

  /**
   * Build the fail-fast bash script: banner, commands, completion banner and
   * a final keypress so the output stays on screen.
   */
  export function script(commands: string[], opts: Options = {}): string {
    const lines = ["set -e"]

    if (opts.description) {
      lines.push(`echo ${Shell.quote(BANNER)}`)
      lines.push(`echo ${Shell.quote(opts.description)}`)
      lines.push(`echo ${Shell.quote(BANNER)}`)
      lines.push("echo ''")
    }

    for (const cmd of commands) lines.push(elevated(cmd, opts.sudo ?? false))

    lines.push("echo ''")
    lines.push(`echo ${Shell.quote(BANNER)}`)
    lines.push("echo 'Operation completed!'")
    lines.push(`echo ${Shell.quote(BANNER)}`)
    lines.push("echo ''")
    lines.push("read -r -p 'Press Enter to continue...' _")

    return lines.join("\n")
  }

  /** Run the commands attached to this terminal's stdin/stdout/stderr */
  export async function interactive(commands: string[], opts: Options = {}, io: Io = consoleIo): Promise<Result> {
    const body = script(commands, opts)
    Log.stage("Terminal:interactive", `${commands.length} command(s) sudo=${opts.sudo ?? false}`)
    Log.block("script", body)

    // Ctrl+C reaches bash too (same foreground group); we only note it
    let interrupted = false
    const onSigint = () => {
      interrupted = true
    }
    process.on("SIGINT", onSigint)

    try {
      const code = await new Promise<number>((resolve, reject) => {
        const proc = spawn("bash", ["-c", body], { stdio: "inherit" })
        proc.once("error", reject)
        proc.once("close", (exit, signal) => resolve(signal === "SIGINT" ? CANCELLED : exit ?? 1))
      })

      if (interrupted || code === CANCELLED) {
        io.print("\n\nOperation cancelled by user.")
        return fromCode(CANCELLED)
      }
      Log.file(`[Terminal] exit ${code}`)
      return fromCode(code)
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err)
      io.print(`\n\nError executing command: ${msg}`)
      Log.file(`[Terminal] spawn failed: ${msg}`)
      return fromCode(1)
    } finally {
      process.off("SIGINT", onSigint)
    }
  }

  /**
   * Show the full command list and run it only after an explicit yes.
   *
   * Declining returns code 0 / success: the operation counts as not
   * attempted rather than failed.
   */
  export async function confirm(commands: string[], opts: Options = {}, io: Io = consoleIo): Promise<Result> {
    io.print("\n" + "=".repeat(60))
    if (opts.description) io.print(opts.description)
    io.print("=".repeat(60))

    io.print("\nThe following commands will be executed:\n")
    commands.forEach((cmd, i) => io.print(`  ${i + 1}. ${elevated(cmd, opts.sudo ?? false)}`))

    if (opts.warning) io.print(chalk.yellow(`\n⚠  WARNING: ${opts.warning}`))
    io.print("\n" + "=".repeat(60))

    const answer = await io.ask("\nContinue? [y/N]: ")
    if (answer === null) {
      io.print("\n\nOperation cancelled.")
      return fromCode(CANCELLED)
    }
    if (!["y", "yes"].includes(answer.trim().toLowerCase())) {
      io.print("Operation cancelled.")
      Log.file("[Terminal] declined by user")
      return fromCode(0)
    }

    return interactive(commands, opts, io)
  }
}
