import { spawn, type ChildProcess } from "child_process"
import { accessSync, constants as fsConstants } from "fs"
import { constants as osConstants } from "os"
import { delimiter, join } from "path"
import { createInterface } from "readline"
import type { Readable } from "stream"
import { Log } from "../util/log"

export namespace Shell {
  /**
   * Applied last on every spawned command, after the caller's env. Package
   * managers must stay non-interactive and print untranslated messages, or
   * the output parsers stop matching.
   */
  export const FORCED_ENV = {
    DEBIAN_FRONTEND: "noninteractive",
    NEEDRESTART_MODE: "a",
    LANG: "C",
    LC_ALL: "C",
  } as const

  /** How long to wait for a killed process to be reaped */
  export const KILL_WAIT = 5_000

  export type Stream = "stdout" | "stderr"

  export interface StreamOptions {
    /** Full environment for the child (not merged with process.env here) */
    env?: NodeJS.ProcessEnv
    /** Milliseconds before the process group is killed. 0 or undefined: wait forever */
    timeout?: number
    signal?: AbortSignal
    /** Called once per line, trailing newline stripped */
    onLine?: (line: string, stream: Stream) => void
    shell?: string
  }

  type Outcome = { kind: "exit"; code: number } | { kind: "timeout" | "aborted" }

  export interface StreamResult {
    stdout: string
    stderr: string
    /** Exit code, or -1 when the process was killed by us */
    code: number
    reason: "exit" | "timeout" | "aborted"
  }

  /**
   * Run a command through the shell with stdout/stderr piped and drained
   * line by line. Both pipes are read concurrently so neither can fill up
   * and stall the child.
   *
   * Rejects only when the process cannot be spawned at all.
   */
  export async function stream(cmd: string, opts: StreamOptions = {}): Promise<StreamResult> {
    const shell = opts.shell ?? "/bin/sh"
    const proc = spawn(shell, ["-c", cmd], {
      env: opts.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
      // own process group, so a kill reaches everything the shell started
      detached: true,
    })

    // raw bytes for the result; readline only feeds the line callback
    const chunks: Record<Stream, Buffer[]> = { stdout: [], stderr: [] }
    const text = (name: Stream) => Buffer.concat(chunks[name]).toString("utf-8")

    const drain = (input: Readable | null, name: Stream) =>
      new Promise<void>((resolve) => {
        if (!input) return resolve()
        input.on("data", (chunk: Buffer) => chunks[name].push(chunk))
        const rl = createInterface({ input, crlfDelay: Infinity })
        rl.on("line", (line) => {
          if (!opts.onLine) return
          try {
            opts.onLine(line, name)
          } catch (err) {
            Log.debug(`Output callback failed: ${err instanceof Error ? err.message : String(err)}`)
          }
        })
        rl.once("close", () => resolve())
      })

    const exited = new Promise<number>((resolve, reject) => {
      proc.once("error", reject)
      proc.once("exit", (code, signal) => resolve(exitCode(code, signal)))
    })

    const finished = Promise.all([drain(proc.stdout, "stdout"), drain(proc.stderr, "stderr"), exited]).then(
      ([, , code]): Outcome => ({ kind: "exit", code }),
    )

    const racers: Promise<Outcome>[] = [finished]
    let timer: ReturnType<typeof setTimeout> | undefined
    let onAbort: (() => void) | undefined

    if (opts.timeout && opts.timeout > 0) {
      const ms = opts.timeout
      racers.push(new Promise<Outcome>((resolve) => (timer = setTimeout(() => resolve({ kind: "timeout" }), ms))))
    }
    if (opts.signal) {
      const signal = opts.signal
      racers.push(
        new Promise<Outcome>((resolve) => {
          if (signal.aborted) return resolve({ kind: "aborted" })
          onAbort = () => resolve({ kind: "aborted" })
          signal.addEventListener("abort", onAbort, { once: true })
        }),
      )
    }

    try {
      const outcome = await Promise.race(racers)
      if (outcome.kind === "exit") {
        return { stdout: text("stdout"), stderr: text("stderr"), code: outcome.code, reason: "exit" }
      }

      kill(proc)
      proc.stdout?.destroy()
      proc.stderr?.destroy()
      await within(exited, KILL_WAIT)
      return { stdout: text("stdout"), stderr: text("stderr"), code: -1, reason: outcome.kind }
    } finally {
      if (timer) clearTimeout(timer)
      if (onAbort) opts.signal?.removeEventListener("abort", onAbort)
    }
  }

  /** Find an executable on PATH. Pure lookup, nothing is run. */
  export function which(cmd: string): string | null {
    const dirs = (process.env.PATH ?? "").split(delimiter).filter(Boolean)
    for (const dir of dirs) {
      const candidate = join(dir, cmd)
      try {
        accessSync(candidate, fsConstants.X_OK)
        return candidate
      } catch {
        continue
      }
    }
    return null
  }

  /** Check if a command exists */
  export function has(cmd: string): boolean {
    return which(cmd) !== null
  }

  /** Shell-safe single-quote a string */
  export function quote(s: string): string {
    return "'" + s.replace(/'/g, "'\\''") + "'"
  }

  function exitCode(code: number | null, signal: NodeJS.Signals | null): number {
    if (code !== null) return code
    if (signal) return 128 + (osConstants.signals[signal] ?? 0)
    return 1
  }

  function kill(proc: ChildProcess) {
    if (proc.pid === undefined) return
    try {
      process.kill(-proc.pid, "SIGKILL")
    } catch (err) {
      Log.debug(`Process group kill failed (${err instanceof Error ? err.message : String(err)}), killing child only`)
      proc.kill("SIGKILL")
    }
  }

  /** Wait for a promise, but give up after ms. Never rejects. */
  async function within(promise: Promise<unknown>, ms: number): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined
    const expired = new Promise<void>((resolve) => (timer = setTimeout(resolve, ms)))
    try {
      await Promise.race([promise.then(() => undefined, () => undefined), expired])
    } finally {
      clearTimeout(timer)
    }
  }
}
