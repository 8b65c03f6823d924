import { Manager } from "../manager"
import type { Executor } from "../../executor/runner"
import { Shell } from "../../executor/shell"
import { Log } from "../../util/log"

const ZYPPER = "zypper --non-interactive"
// Example: ( 3/10) Installing: htop-3.3.0-1.1.x86_64
const COUNTER = /\(\s*(\d+)\/(\d+)\)/

const ACTIONS: [marker: string, action: string][] = [
  ["Refreshing service", "Refreshing repositories"],
  ["Retrieving repository", "Refreshing repositories"],
  ["Loading repository data", "Loading repository data"],
  ["Reading installed packages", "Reading installed packages"],
  ["Resolving package dependencies", "Resolving dependencies"],
  ["Retrieving", "Downloading packages"],
  ["Checking for file conflicts", "Checking conflicts"],
  ["Installing:", "Installing packages"],
  ["Running post-transaction scripts", "Running post-transaction scripts"],
]

export namespace Zypper {
  /**
   * `zypper search` prints a table:
   *
   *   S  | Name | Summary              | Type
   *   ---+------+----------------------+--------
   *   i+ | htop | Interactive process… | package
   */
  export function parseSearch(stdout: string): Manager.PackageInfo[] {
    const packages: Manager.PackageInfo[] = []

    for (const line of stdout.split("\n")) {
      const cols = line.split("|").map((c) => c.trim())
      if (cols.length < 4) continue
      const [status = "", name = "", summary = "", type = ""] = cols
      if (!name || name === "Name" || /^-+$/.test(name)) continue
      if (type !== "package") continue
      packages.push({
        name,
        version: "",
        description: summary,
        installed: status.startsWith("i"),
        available: true,
      })
    }

    return packages
  }

  export function parseInfo(stdout: string): { version: string; description: string } | null {
    const fields = Manager.parseFields(stdout)
    // zypper info exits 0 for unknown packages and just prints a notice
    const version = fields["Version"]
    if (version === undefined) return null
    return { version, description: fields["Summary"] ?? "" }
  }

  export function parseOutput(output: string): Manager.Progress {
    const info = Manager.emptyProgress()
    const hit = ACTIONS.find(([marker]) => output.includes(marker))
    if (hit) info.currentAction = hit[1]
    const m = COUNTER.exec(output)
    if (m) info.progress = Manager.ratio(m[1], m[2])
    return info
  }

  export function explain(stderr: string, pkg: string): string {
    if (stderr.includes(`'${pkg}' not found`) || stderr.includes(`No provider of '${pkg}' found`)) {
      return `Package '${pkg}' not found in repositories`
    }
    if (stderr.includes("nothing provides")) return "Unmet dependencies"
    if (stderr.includes("conflicts with")) return "Package conflicts with installed packages"
    if (stderr.includes("Not enough free disk space")) return "Insufficient disk space"
    const line = stderr.split("\n").find((l) => l.startsWith("Problem:"))
    return line ? line.slice(8).trim() : "Installation failed"
  }
}

export class ZypperManager implements Manager.Adapter {
  readonly name = "zypper"
  private readonly executor: Executor
  private readonly timeouts: Manager.Timeouts
  private cacheUpdated = false

  constructor(opts: Manager.Options) {
    this.executor = opts.executor
    this.timeouts = Manager.timeouts(opts.timeouts)
  }

  async updateCache(): Promise<boolean> {
    const result = await this.executor.execute(`${ZYPPER} refresh`, { sudo: true, timeout: this.timeouts.cache })
    if (result.success) this.cacheUpdated = true
    else Log.warn(`zypper refresh failed: ${result.status} (exit ${result.exitCode})`)
    return result.success
  }

  async installPackages(packages: string[], onProgress?: Manager.OnProgress): Promise<Manager.InstallResult> {
    if (!this.cacheUpdated) {
      onProgress?.("Refreshing repositories...")
      await this.updateCache()
    }

    return Manager.installVerified({
      executor: this.executor,
      packages,
      command: (pkgs) => `${ZYPPER} install --auto-agree-with-licenses ${pkgs.join(" ")}`,
      timeout: this.timeouts.install,
      onProgress,
      isInstalled: (pkg) => this.isPackageInstalled(pkg),
      explain: Zypper.explain,
    })
  }

  async isPackageInstalled(pkg: string): Promise<boolean> {
    if (!Manager.isValidPackageName(pkg)) return false
    const result = await this.executor.execute(`rpm -q ${pkg}`)
    return result.exitCode === 0
  }

  async searchPackage(query: string): Promise<Manager.PackageInfo[]> {
    const result = await this.executor.execute(`${ZYPPER} search ${Shell.quote(query)}`)
    const packages = Zypper.parseSearch(result.stdout)
    Log.parsed("zypper search", { query, count: packages.length })
    return packages
  }

  async getPackageInfo(pkg: string): Promise<Manager.PackageInfo | null> {
    if (!Manager.isValidPackageName(pkg)) return null
    const result = await this.executor.execute(`${ZYPPER} info ${pkg}`)
    if (!result.success) return null
    const info = Zypper.parseInfo(result.stdout)
    if (!info) return null
    return {
      name: pkg,
      ...info,
      installed: await this.isPackageInstalled(pkg),
      available: true,
    }
  }

  async upgradeSystem(onProgress?: Manager.OnProgress): Promise<boolean> {
    onProgress?.("Refreshing repositories...")
    if (!(await this.updateCache())) return false

    onProgress?.("Upgrading packages...")
    const result = await this.executor.execute(`${ZYPPER} update --auto-agree-with-licenses`, {
      sudo: true,
      timeout: this.timeouts.upgrade,
      onOutput: onProgress,
    })
    return result.success
  }

  parseOutput(output: string): Manager.Progress {
    return Zypper.parseOutput(output)
  }

  installCommand(packages: string[]): string {
    return `zypper install ${packages.filter(Manager.isValidPackageName).join(" ")}`
  }

  upgradeCommands(): string[] {
    return ["zypper refresh", "zypper update"]
  }
}
