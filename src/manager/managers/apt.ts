import { Manager } from "../manager"
import type { Executor } from "../../executor/runner"
import { Shell } from "../../executor/shell"
import { Log } from "../../util/log"

// Example: htop/jammy,now 3.0.5-7build2 amd64 [installed]
const SEARCH_HEADER = /^([^/\s]+)\/\S+\s+(\S+)/
const PROGRESS = /Progress:\s*\[\s*(\d+)%\]/

// First match wins, so the order is the priority
const ACTIONS: [marker: string, action: string][] = [
  ["Reading package lists", "Reading package lists"],
  ["Building dependency tree", "Building dependency tree"],
  ["Reading state information", "Reading state information"],
  ["The following NEW packages will be installed", "Calculating packages to install"],
  ["Unpacking", "Unpacking packages"],
  ["Setting up", "Setting up packages"],
  ["Processing triggers", "Processing triggers"],
  ["Fetched", "Downloading packages"],
]

/** Pure parsers for apt/dpkg output */
export namespace Apt {
  export function parseSearch(stdout: string): Manager.PackageInfo[] {
    const packages: Manager.PackageInfo[] = []
    let current: Manager.PackageInfo | undefined

    for (const line of stdout.split("\n")) {
      if (!line.trim()) continue
      if (!/^\s/.test(line)) {
        const m = SEARCH_HEADER.exec(line)
        if (!m?.[1] || !m[2]) {
          current = undefined
          continue
        }
        current = {
          name: m[1],
          version: m[2],
          description: "",
          installed: /\[installed/.test(line),
          available: true,
        }
        packages.push(current)
      } else if (current && !current.description) {
        current.description = line.trim()
      }
    }

    return packages
  }

  export function parseInfo(stdout: string): { version: string; description: string } {
    const fields = Manager.parseFields(stdout)
    return { version: fields["Version"] ?? "", description: fields["Description"] ?? "" }
  }

  /** dpkg-query status line */
  export function isInstalledStatus(stdout: string): boolean {
    return stdout.includes("install ok installed")
  }

  export function parseOutput(output: string): Manager.Progress {
    const info = Manager.emptyProgress()
    const m = PROGRESS.exec(output)
    if (m?.[1]) info.progress = Math.min(100, Number(m[1]))
    const hit = ACTIONS.find(([marker]) => output.includes(marker))
    if (hit) info.currentAction = hit[1]
    return info
  }

  export function explain(stderr: string, pkg: string): string {
    if (stderr.includes(`Unable to locate package ${pkg}`)) return `Package '${pkg}' not found in repositories`
    if (stderr.includes("Unmet dependencies")) return "Unmet dependencies"
    if (stderr.includes("has no installation candidate")) return "No installation candidate available"
    const line = stderr.split("\n").find((l) => l.startsWith("E:"))
    return line ? line.slice(3).trim() : "Installation failed"
  }
}

export class AptManager implements Manager.Adapter {
  readonly name = "apt"
  private readonly executor: Executor
  private readonly timeouts: Manager.Timeouts
  private cacheUpdated = false

  constructor(opts: Manager.Options) {
    this.executor = opts.executor
    this.timeouts = Manager.timeouts(opts.timeouts)
  }

  async updateCache(): Promise<boolean> {
    const result = await this.executor.execute("apt update", { sudo: true, timeout: this.timeouts.cache })
    if (result.success) this.cacheUpdated = true
    else Log.warn(`apt update failed: ${result.status} (exit ${result.exitCode})`)
    return result.success
  }

  async installPackages(packages: string[], onProgress?: Manager.OnProgress): Promise<Manager.InstallResult> {
    // a failed refresh is not fatal: the existing lists may still do
    if (!this.cacheUpdated) {
      onProgress?.("Updating package cache...")
      await this.updateCache()
    }

    return Manager.installVerified({
      executor: this.executor,
      packages,
      command: (pkgs) => `apt install -y ${pkgs.join(" ")}`,
      timeout: this.timeouts.install,
      onProgress,
      isInstalled: (pkg) => this.isPackageInstalled(pkg),
      explain: Apt.explain,
    })
  }

  async isPackageInstalled(pkg: string): Promise<boolean> {
    if (!Manager.isValidPackageName(pkg)) return false
    const result = await this.executor.execute(`dpkg-query -W -f='\${Status}' ${pkg} 2>/dev/null`)
    return result.success && Apt.isInstalledStatus(result.stdout)
  }

  async searchPackage(query: string): Promise<Manager.PackageInfo[]> {
    const result = await this.executor.execute(`apt search ${Shell.quote(query)}`)
    const packages = Apt.parseSearch(result.stdout)
    Log.parsed("apt search", { query, count: packages.length })
    return packages
  }

  async getPackageInfo(pkg: string): Promise<Manager.PackageInfo | null> {
    if (!Manager.isValidPackageName(pkg)) return null
    const result = await this.executor.execute(`apt show ${pkg}`)
    if (!result.success) return null
    return {
      name: pkg,
      ...Apt.parseInfo(result.stdout),
      installed: await this.isPackageInstalled(pkg),
      available: true,
    }
  }

  async upgradeSystem(onProgress?: Manager.OnProgress): Promise<boolean> {
    onProgress?.("Updating package lists...")
    if (!(await this.updateCache())) return false

    onProgress?.("Upgrading packages...")
    const result = await this.executor.execute("apt full-upgrade -y", {
      sudo: true,
      timeout: this.timeouts.upgrade,
      onOutput: onProgress,
    })
    return result.success
  }

  parseOutput(output: string): Manager.Progress {
    return Apt.parseOutput(output)
  }

  installCommand(packages: string[]): string {
    return `apt install ${packages.filter(Manager.isValidPackageName).join(" ")}`
  }

  upgradeCommands(): string[] {
    return ["apt update", "apt full-upgrade"]
  }
}
