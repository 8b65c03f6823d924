import { Manager } from "../manager"
import type { Executor } from "../../executor/runner"
import { Shell } from "../../executor/shell"
import { Log } from "../../util/log"

// Example: (3/10): htop-3.3.0-1.fc40.x86_64.rpm
const COUNTER = /\((\d+)\/(\d+)\):/
// Example:   Installing       : htop-3.3.0-1.fc40.x86_64    1/2
const STEP = /\s(\d+)\/(\d+)\s*$/

const ACTIONS: [marker: string, action: string][] = [
  ["Downloading Packages:", "Downloading packages"],
  // header and per-package transaction lines, which pad before the colon
  ["Installing", "Installing packages"],
  ["Upgrading", "Upgrading packages"],
  ["Running transaction check", "Checking transaction"],
  ["Running transaction test", "Testing transaction"],
  ["Running transaction", "Running transaction"],
  ["Verifying", "Verifying packages"],
  ["Complete!", "Complete"],
]

/** check-update exits 100 when updates are available */
const CACHE_OK = new Set([0, 100])

export namespace Dnf {
  /**
   * Result lines follow a `=== Name Matched: ... ===` banner and look like
   * `name.arch : summary`.
   */
  export function parseSearch(stdout: string): Manager.PackageInfo[] {
    const packages: Manager.PackageInfo[] = []
    let inResults = false

    for (const line of stdout.split("\n")) {
      if (line.includes("=") && line.length > 50) {
        inResults = true
        continue
      }
      if (!inResults) continue
      const idx = line.indexOf(":")
      if (idx <= 0) continue

      const nameArch = line.slice(0, idx).trim()
      const dot = nameArch.lastIndexOf(".")
      const name = dot > 0 ? nameArch.slice(0, dot) : nameArch
      if (!name) continue
      packages.push({
        name,
        version: "",
        description: line.slice(idx + 1).trim(),
        installed: false,
        available: true,
      })
    }

    return packages
  }

  export function parseInfo(stdout: string): { version: string; description: string } {
    const fields = Manager.parseFields(stdout)
    return { version: fields["Version"] ?? "", description: fields["Summary"] ?? "" }
  }

  export function parseOutput(output: string): Manager.Progress {
    const info = Manager.emptyProgress()
    const hit = ACTIONS.find(([marker]) => output.includes(marker))
    if (hit) {
      info.currentAction = hit[1]
      if (hit[1] === "Complete") info.progress = 100
    }
    const m = COUNTER.exec(output) ?? STEP.exec(output)
    if (m) info.progress = Manager.ratio(m[1], m[2]) ?? info.progress
    return info
  }

  export function explain(stderr: string, pkg: string): string {
    if (stderr.includes(`No match for argument: ${pkg}`)) return `Package '${pkg}' not found in repositories`
    if (stderr.includes("Error: Unable to find a match")) return `Package '${pkg}' not available`
    if (stderr.includes("conflicts with")) return "Package conflicts with installed packages"
    if (stderr.includes("Insufficient space")) return "Insufficient disk space"
    const line = stderr.split("\n").find((l) => l.startsWith("Error:"))
    return line ? line.slice(7).trim() : "Installation failed"
  }
}

export class DnfManager implements Manager.Adapter {
  readonly name = "dnf"
  private readonly executor: Executor
  private readonly timeouts: Manager.Timeouts
  private cacheUpdated = false

  constructor(opts: Manager.Options) {
    this.executor = opts.executor
    this.timeouts = Manager.timeouts(opts.timeouts)
  }

  async updateCache(): Promise<boolean> {
    const result = await this.executor.execute("dnf check-update", { sudo: true, timeout: this.timeouts.cache })
    const ok = result.status !== "timeout" && result.status !== "cancelled" && CACHE_OK.has(result.exitCode)
    if (ok) this.cacheUpdated = true
    else Log.warn(`dnf check-update failed: ${result.status} (exit ${result.exitCode})`)
    return ok
  }

  async installPackages(packages: string[], onProgress?: Manager.OnProgress): Promise<Manager.InstallResult> {
    if (!this.cacheUpdated) {
      onProgress?.("Updating package cache...")
      await this.updateCache()
    }

    return Manager.installVerified({
      executor: this.executor,
      packages,
      command: (pkgs) => `dnf install -y ${pkgs.join(" ")}`,
      timeout: this.timeouts.install,
      onProgress,
      isInstalled: (pkg) => this.isPackageInstalled(pkg),
      explain: Dnf.explain,
    })
  }

  async isPackageInstalled(pkg: string): Promise<boolean> {
    if (!Manager.isValidPackageName(pkg)) return false
    const result = await this.executor.execute(`rpm -q ${pkg}`)
    return result.exitCode === 0
  }

  async searchPackage(query: string): Promise<Manager.PackageInfo[]> {
    const result = await this.executor.execute(`dnf search ${Shell.quote(query)}`)
    const packages = Dnf.parseSearch(result.stdout)
    Log.parsed("dnf search", { query, count: packages.length })
    return packages
  }

  async getPackageInfo(pkg: string): Promise<Manager.PackageInfo | null> {
    if (!Manager.isValidPackageName(pkg)) return null
    const result = await this.executor.execute(`dnf info ${pkg}`)
    if (!result.success) return null
    return {
      name: pkg,
      ...Dnf.parseInfo(result.stdout),
      installed: await this.isPackageInstalled(pkg),
      available: true,
    }
  }

  async upgradeSystem(onProgress?: Manager.OnProgress): Promise<boolean> {
    onProgress?.("Checking for updates...")
    if (!(await this.updateCache())) return false

    onProgress?.("Upgrading packages...")
    const result = await this.executor.execute("dnf upgrade -y", {
      sudo: true,
      timeout: this.timeouts.upgrade,
      onOutput: onProgress,
    })
    return result.success
  }

  parseOutput(output: string): Manager.Progress {
    return Dnf.parseOutput(output)
  }

  installCommand(packages: string[]): string {
    return `dnf install ${packages.filter(Manager.isValidPackageName).join(" ")}`
  }

  upgradeCommands(): string[] {
    return ["dnf upgrade --refresh"]
  }
}
