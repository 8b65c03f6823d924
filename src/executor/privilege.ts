import { spawn } from "child_process"
import { Shell } from "./shell"
import { Log } from "../util/log"

/**
 * Elevation is required but impossible: no sudo/pkexec, or the user or
 * system refused. Raised before any subprocess for the real command starts.
 */
export class PrivilegeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "PrivilegeError"
  }
}

export namespace Privilege {
  /** Runs an argv and resolves with its exit code. `interactive` attaches the terminal. */
  export type Run = (argv: string[], interactive: boolean) => Promise<number>

  export interface Options {
    /** PATH lookup, defaults to Shell.has */
    has?: (cmd: string) => boolean
    run?: Run
  }

  export const run: Run = (argv, interactive) =>
    new Promise((resolve, reject) => {
      const [cmd, ...args] = argv
      if (!cmd) return reject(new Error("Empty command"))
      const proc = spawn(cmd, args, { stdio: interactive ? "inherit" : "ignore" })
      proc.once("error", reject)
      proc.once("close", (code) => resolve(code ?? 1))
    })
}

/**
 * Decides whether and how a command gets root. Never handles a password:
 * prompting is left to sudo/pkexec themselves.
 *
 * The cached flag reports the last check or request. It is informational:
 * every wrapped command still goes through `sudo -n`, which re-checks on
 * its own.
 */
export class PrivilegeHandler {
  readonly hasSudo: boolean
  readonly hasPkexec: boolean
  private readonly runner: Privilege.Run
  private privilegesCached = false

  constructor(opts: Privilege.Options = {}) {
    const has = opts.has ?? Shell.has
    this.hasSudo = has("sudo")
    this.hasPkexec = has("pkexec")
    this.runner = opts.run ?? Privilege.run
  }

  get cached(): boolean {
    return this.privilegesCached
  }

  canElevate(): boolean {
    return this.hasSudo || this.hasPkexec
  }

  /** Non-interactive check: true only if sudo would run without asking */
  async checkPrivileges(): Promise<boolean> {
    if (!this.hasSudo) return false
    try {
      const code = await this.runner(["sudo", "-n", "true"], false)
      this.privilegesCached = code === 0
      return this.privilegesCached
    } catch (err) {
      Log.debug(`sudo check failed: ${err instanceof Error ? err.message : String(err)}`)
      return false
    }
  }

  /** Ask for elevation, allowing sudo/pkexec to prompt on the terminal */
  async requestElevation(): Promise<boolean> {
    if (!this.canElevate()) {
      throw new PrivilegeError("No privilege elevation tool found (sudo/pkexec)")
    }

    const argv = this.hasSudo ? ["sudo", "-v"] : ["pkexec", "true"]
    Log.stage("Privilege:request", argv[0])

    let code: number
    try {
      code = await this.runner(argv, true)
    } catch (err) {
      throw new PrivilegeError(`Failed to elevate privileges: ${err instanceof Error ? err.message : String(err)}`)
    }
    if (code !== 0) throw new PrivilegeError("Privilege elevation was denied")

    this.privilegesCached = true
    return true
  }

  /**
   * Make sure an elevated command can start. sudo keeps a timestamp between
   * commands, so one interactive `sudo -v` covers the batch. pkexec keeps
   * nothing and asks inside every wrapped command, so it is not asked twice.
   */
  async ensure(): Promise<void> {
    if (!this.canElevate()) {
      throw new PrivilegeError("Elevation required but neither sudo nor pkexec is available")
    }
    if (!this.hasSudo) return
    if (await this.checkPrivileges()) return
    await this.requestElevation()
  }

  /**
   * Prefix a command for elevated, non-prompting execution. Assumes the
   * caller already checked or requested privileges.
   */
  wrapCommand(command: string, useSudo = false): string {
    if (!useSudo) return command
    if (this.hasSudo) return `sudo -n ${command}`
    if (this.hasPkexec) return `pkexec sh -c ${Shell.quote(command)}`
    return command
  }
}
