import { Shell } from "./shell"
import { PrivilegeHandler } from "./privilege"
import { Log } from "../util/log"

export type CommandStatus = "success" | "failed" | "timeout" | "cancelled"

/** Outcome of one non-interactive command. Frozen once built. */
export interface CommandResult {
  readonly command: string
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
  readonly status: CommandStatus
  readonly durationMs: number
  /** exit code 0 and status success */
  readonly success: boolean
  /** stdout followed by stderr */
  readonly output: string
}

export namespace CommandResult {
  export function create(fields: Omit<CommandResult, "success" | "output">): CommandResult {
    return Object.freeze({
      ...fields,
      success: fields.exitCode === 0 && fields.status === "success",
      output: fields.stdout + fields.stderr,
    })
  }
}

export interface ExecuteOptions {
  sudo?: boolean
  /** Milliseconds; the process group is killed when it runs out */
  timeout?: number
  /** Receives every stdout and stderr line as it arrives */
  onOutput?: (line: string) => void
  /** Overrides on top of process.env (the forced locale/frontend vars still win) */
  env?: Record<string, string>
  signal?: AbortSignal
}

export interface BatchOptions {
  sudo?: boolean
  timeout?: number
  stopOnError?: boolean
  onStart?: (command: string) => void
  onComplete?: (result: CommandResult) => void
  signal?: AbortSignal
}

/** Anything that can run a single command. Adapters and flows depend on this. */
export interface Executor {
  execute(command: string, opts?: ExecuteOptions): Promise<CommandResult>
  executeMultiple(commands: string[], opts?: BatchOptions): Promise<CommandResult[]>
}

export interface RunnerOptions {
  privilege?: PrivilegeHandler
  /** Shell used for `-c`, default /bin/sh */
  shell?: string
  /**
   * Cancels whatever runs when it fires (Ctrl+C). Commands started after
   * that end as cancelled without being spawned.
   */
  signal?: AbortSignal
}

/**
 * Runs one command at a time through the shell, optionally elevated, and
 * turns every execution-time problem into a failed CommandResult. The only
 * thing that escapes as an exception is a PrivilegeError.
 */
export class CommandRunner implements Executor {
  readonly privilege: PrivilegeHandler
  private readonly shell: string | undefined
  private readonly signal: AbortSignal | undefined

  constructor(opts: RunnerOptions = {}) {
    this.privilege = opts.privilege ?? new PrivilegeHandler()
    this.shell = opts.shell
    this.signal = opts.signal
  }

  async execute(command: string, opts: ExecuteOptions = {}): Promise<CommandResult> {
    const start = performance.now()
    const signal = opts.signal ?? this.signal
    let cmd = command

    if (signal?.aborted) {
      const result = CommandResult.create({
        command,
        exitCode: -1,
        stdout: "",
        stderr: "Cancelled before start",
        status: "cancelled",
        durationMs: 0,
      })
      Log.outcome(command, result)
      return result
    }

    if (opts.sudo) {
      await this.privilege.ensure()
      cmd = this.privilege.wrapCommand(command, true)
    }

    const env: NodeJS.ProcessEnv = { ...process.env, ...opts.env, ...Shell.FORCED_ENV }
    const onOutput = opts.onOutput

    Log.command(cmd)
    let result: CommandResult
    try {
      const out = await Shell.stream(cmd, {
        env,
        timeout: opts.timeout,
        signal,
        shell: this.shell,
        onLine: onOutput ? (line) => onOutput(line) : undefined,
      })
      result = CommandResult.create({
        command: cmd,
        exitCode: out.code,
        stdout: out.stdout,
        stderr: out.stderr,
        status: statusOf(out),
        durationMs: Math.round(performance.now() - start),
      })
    } catch (err) {
      result = CommandResult.create({
        command: cmd,
        exitCode: -1,
        stdout: "",
        stderr: err instanceof Error ? err.message : String(err),
        status: "failed",
        durationMs: Math.round(performance.now() - start),
      })
    }

    Log.outcome(cmd, result)
    return result
  }

  /**
   * Run commands strictly in order; a later one may depend on an earlier one
   * (cache refresh before install). With stopOnError the first unsuccessful
   * result ends the batch.
   */
  async executeMultiple(commands: string[], opts: BatchOptions = {}): Promise<CommandResult[]> {
    const stopOnError = opts.stopOnError ?? true
    const results: CommandResult[] = []

    for (const cmd of commands) {
      opts.onStart?.(cmd)
      const result = await this.execute(cmd, { sudo: opts.sudo, timeout: opts.timeout, signal: opts.signal })
      results.push(result)
      opts.onComplete?.(result)
      if (stopOnError && !result.success) break
    }

    return results
  }
}

function statusOf(out: Shell.StreamResult): CommandStatus {
  if (out.reason === "timeout") return "timeout"
  if (out.reason === "aborted") return "cancelled"
  return out.code === 0 ? "success" : "failed"
}
