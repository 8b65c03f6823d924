import type { CommandStatus, Executor } from "../executor/runner"
import { Log } from "../util/log"

export namespace Manager {
  export interface PackageInfo {
    name: string
    /** empty when unknown */
    version: string
    description: string
    installed: boolean
    /** present in the configured repositories */
    available: boolean
  }

  export interface InstallResult {
    readonly success: boolean
    readonly packagesInstalled: string[]
    readonly packagesFailed: string[]
    /** package → human readable reason, only for failed packages */
    readonly errors: Record<string, string>
    readonly output: string
    /** success and nothing failed */
    readonly allSuccessful: boolean
  }

  export interface Progress {
    /** 0-100 when derivable from the output */
    progress: number | null
    currentAction: string
  }

  export type OnProgress = (line: string) => void

  /** Timeouts in milliseconds */
  export interface Timeouts {
    cache: number
    install: number
    upgrade: number
  }

  export const DEFAULT_TIMEOUTS: Timeouts = {
    cache: 300_000,
    install: 1_800_000,
    upgrade: 3_600_000,
  }

  export interface Options {
    executor: Executor
    timeouts?: Partial<Timeouts>
  }

  /** The operation set every backend (apt, dnf, ...) provides */
  export interface Adapter {
    readonly name: string
    updateCache(): Promise<boolean>
    installPackages(packages: string[], onProgress?: OnProgress): Promise<InstallResult>
    isPackageInstalled(pkg: string): Promise<boolean>
    searchPackage(query: string): Promise<PackageInfo[]>
    getPackageInfo(pkg: string): Promise<PackageInfo | null>
    upgradeSystem(onProgress?: OnProgress): Promise<boolean>
    /** Classify a chunk of output. Never throws. */
    parseOutput(output: string): Progress
    /** Command line for the interactive path; the native tool asks for confirmation */
    installCommand(packages: string[]): string
    upgradeCommands(): string[]
  }

  export function timeouts(overrides?: Partial<Timeouts>): Timeouts {
    return { ...DEFAULT_TIMEOUTS, ...overrides }
  }

  export function emptyProgress(): Progress {
    return { progress: null, currentAction: "" }
  }

  export function installResult(fields: Omit<InstallResult, "allSuccessful">): InstallResult {
    return {
      ...fields,
      allSuccessful: fields.success && fields.packagesFailed.length === 0,
    }
  }

  const VALID_PKG_NAME = /^[a-zA-Z0-9][a-zA-Z0-9._+:~-]*$/

  /** Package names end up in shell command lines; anything else is refused */
  export function isValidPackageName(pkg: string): boolean {
    return VALID_PKG_NAME.test(pkg)
  }

  /**
   * Split `key: value` lines (first colon) into a map. The first occurrence of
   * a key wins, so with several stanzas the first one describes the package.
   */
  export function parseFields(text: string): Record<string, string> {
    const fields: Record<string, string> = {}
    for (const line of text.split("\n")) {
      const idx = line.indexOf(":")
      if (idx <= 0) continue
      const key = line.slice(0, idx).trim()
      if (!key || key in fields) continue
      fields[key] = line.slice(idx + 1).trim()
    }
    return fields
  }

  /** Percentage from an `(n/m)` style counter */
  export function ratio(current: string | undefined, total: string | undefined): number | null {
    const c = Number(current)
    const t = Number(total)
    if (!Number.isFinite(c) || !Number.isFinite(t) || t <= 0) return null
    return Math.min(100, Math.floor((c / t) * 100))
  }

  export interface VerifiedInstall {
    executor: Executor
    packages: string[]
    /** Builds the one combined install command for the valid names */
    command: (packages: string[]) => string
    timeout: number
    onProgress?: OnProgress
    isInstalled: (pkg: string) => Promise<boolean>
    /** Best-effort reason for one failed package, from the install stderr */
    explain: (stderr: string, pkg: string) => string
  }

  function failure(status: CommandStatus): string | undefined {
    if (status === "timeout") return "Installation timed out"
    if (status === "cancelled") return "Installation cancelled"
    return undefined
  }

  /**
   * Install everything in one elevated command. If that does not fully
   * succeed, ask the package database about each name individually and
   * split the request into installed and failed.
   */
  export async function installVerified(input: VerifiedInstall): Promise<InstallResult> {
    const requested = [...new Set(input.packages)]
    const valid = requested.filter(isValidPackageName)
    const invalid = requested.filter((p) => !isValidPackageName(p))
    const errors: Record<string, string> = {}
    for (const pkg of invalid) errors[pkg] = "Invalid package name"

    if (valid.length === 0) {
      return installResult({
        success: invalid.length === 0,
        packagesInstalled: [],
        packagesFailed: invalid,
        errors,
        output: "",
      })
    }

    const result = await input.executor.execute(input.command(valid), {
      sudo: true,
      timeout: input.timeout,
      onOutput: input.onProgress,
    })

    const installed: string[] = []
    const failed: string[] = [...invalid]

    if (result.success) {
      installed.push(...valid)
    } else {
      Log.stage("Manager:verify", `install exited ${result.exitCode} (${result.status}), checking ${valid.length} package(s)`)
      for (const pkg of valid) {
        if (await input.isInstalled(pkg)) {
          installed.push(pkg)
        } else {
          failed.push(pkg)
          errors[pkg] = failure(result.status) ?? input.explain(result.stderr, pkg)
        }
      }
    }

    return installResult({
      success: result.success && invalid.length === 0,
      packagesInstalled: installed,
      packagesFailed: failed,
      errors,
      output: result.output,
    })
  }
}
