import chalk from "chalk"
import { mkdirSync, appendFileSync } from "fs"
import { join } from "path"

export namespace Log {
  export type Level = "debug" | "info" | "warn" | "error"

  const ORDER: Level[] = ["debug", "info", "warn", "error"]
  const PREVIEW = 200
  const OUTPUT_TAIL = 500

  let threshold: Level = "info"
  let target: string | null = null

  export function setLevel(level: Level) {
    threshold = level
  }

  function enabled(level: Level): boolean {
    return ORDER.indexOf(level) >= ORDER.indexOf(threshold)
  }

  /** `$XDG_CONFIG_HOME/distrokit/logs`, else `~/.config/distrokit/logs` */
  export function logDir(): string {
    const base = process.env.XDG_CONFIG_HOME || join(process.env.HOME || "~", ".config")
    return join(base, "distrokit", "logs")
  }

  export function logFilePath(): string | null {
    return target
  }

  /** Open today's log file. Without a writable directory only the terminal gets output. */
  export function init(args: string[] = process.argv.slice(2)) {
    const dir = logDir()
    try {
      mkdirSync(dir, { recursive: true })
    } catch (err) {
      target = null
      debug(`File logging disabled: ${err instanceof Error ? err.message : String(err)}`)
      return
    }
    const now = new Date().toISOString()
    target = join(dir, `distrokit-${now.slice(0, 10)}.log`)
    file(`=== distrokit ${args.join(" ")} (pid ${process.pid}, ${now})`)
  }

  /** Append one line to the log file, whatever the level */
  export function file(msg: string) {
    if (!target) return
    try {
      appendFileSync(target, `${new Date().toISOString().slice(11, 23)} ${msg}\n`)
    } catch {
      // stop writing for the rest of the session
      target = null
    }
  }

  /** Multi-line payload (scripts, parsed objects) fenced by its label */
  export function block(label: string, data: unknown) {
    if (!target) return
    const body = typeof data === "string" ? data : JSON.stringify(data, null, 2)
    file(`>>> ${label}\n${body}\n<<< ${label}`)
  }

  export function debug(msg: string, ...args: unknown[]) {
    file(`DEBUG ${msg}${args.length ? ` ${JSON.stringify(args)}` : ""}`)
    if (enabled("debug")) console.error(chalk.gray(`[debug] ${msg}`), ...args)
  }

  export function info(msg: string, ...args: unknown[]) {
    file(`INFO  ${msg}`)
    if (enabled("info")) console.log(chalk.blue("ℹ"), msg, ...args)
  }

  export function success(msg: string, ...args: unknown[]) {
    file(`OK    ${msg}`)
    if (enabled("info")) console.log(chalk.green("✔"), msg, ...args)
  }

  export function warn(msg: string, ...args: unknown[]) {
    file(`WARN  ${msg}`)
    if (enabled("warn")) console.log(chalk.yellow("⚠"), msg, ...args)
  }

  export function error(msg: string, ...args: unknown[]) {
    file(`ERROR ${msg}`)
    if (enabled("error")) console.error(chalk.red("✖"), msg, ...args)
  }

  /** Catalogs, detection results, batch summaries */
  export function parsed(label: string, data: unknown) {
    block(`parsed ${label}`, data)
    if (enabled("debug")) {
      const str = JSON.stringify(data) ?? ""
      const more = str.length > PREVIEW ? "..." : ""
      console.error(chalk.gray(`[parsed] ${label}: ${str.slice(0, PREVIEW)}${more}`))
    }
  }

  /** A command line about to be started by the runner */
  export function command(cmd: string) {
    file(`EXEC  $ ${cmd}`)
    if (enabled("debug")) {
      const more = cmd.length > 100 ? "..." : ""
      console.error(chalk.gray(`[exec] $ ${cmd.slice(0, 100)}${more}`))
    }
  }

  export interface Outcome {
    status: string
    exitCode: number
    durationMs: number
    stdout: string
    stderr: string
  }

  /** How a command ended; failures keep the tail of stderr */
  export function outcome(cmd: string, res: Outcome) {
    const head = `${res.status} exit=${res.exitCode} ${res.durationMs}ms`
    if (res.status === "success") {
      file(`DONE  ${head} ${cmd}`)
      return
    }
    file(`FAIL  ${head} ${cmd}`)
    const tail = (res.stderr || res.stdout).slice(-OUTPUT_TAIL).trim()
    if (tail) block("output", tail)
  }

  /** Phase transition inside a flow */
  export function stage(name: string, detail?: string) {
    const msg = detail ? `${name}: ${detail}` : name
    file(`STAGE ${msg}`)
    if (enabled("debug")) console.error(chalk.magenta(`[stage] ${msg}`))
  }
}
