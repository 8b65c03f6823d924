import { Manager } from "../manager"
import type { Executor } from "../../executor/runner"
import { Shell } from "../../executor/shell"
import { Log } from "../../util/log"

// Example: extra/htop 3.3.0-1 [installed]
const SEARCH_HEADER = /^(\S+)\/(\S+)\s+(\S+)/
// Example: ( 2/10) installing htop
const COUNTER = /\(\s*(\d+)\/(\d+)\)/

const ACTIONS: [marker: string, action: string][] = [
  ["Synchronizing package databases", "Synchronizing package databases"],
  ["resolving dependencies", "Resolving dependencies"],
  ["looking for conflicting packages", "Checking conflicts"],
  ["Retrieving packages", "Downloading packages"],
  ["checking package integrity", "Verifying packages"],
  ["Running post-transaction hooks", "Running hooks"],
  ["upgrading", "Upgrading packages"],
  ["installing", "Installing packages"],
]

export namespace Pacman {
  export function parseSearch(stdout: string): Manager.PackageInfo[] {
    const packages: Manager.PackageInfo[] = []
    let current: Manager.PackageInfo | undefined

    for (const line of stdout.split("\n")) {
      if (!line.trim()) continue
      if (/^\s/.test(line)) {
        if (current && !current.description) current.description = line.trim()
        continue
      }
      const m = SEARCH_HEADER.exec(line)
      if (!m?.[2] || !m[3]) {
        current = undefined
        continue
      }
      current = {
        name: m[2],
        version: m[3],
        description: "",
        installed: /\[installed/.test(line),
        available: true,
      }
      packages.push(current)
    }

    return packages
  }

  export function parseInfo(stdout: string): { version: string; description: string } {
    const fields = Manager.parseFields(stdout)
    return { version: fields["Version"] ?? "", description: fields["Description"] ?? "" }
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
    if (stderr.includes(`target not found: ${pkg}`)) return `Package '${pkg}' not found in repositories`
    if (stderr.includes("unable to satisfy dependency")) return "Unmet dependencies"
    if (stderr.includes("are in conflict") || stderr.includes("conflicting files")) {
      return "Package conflicts with installed packages"
    }
    if (stderr.includes("not enough free disk space")) return "Insufficient disk space"
    const line = stderr.split("\n").find((l) => l.startsWith("error:"))
    return line ? line.slice(6).trim() : "Installation failed"
  }
}

export class PacmanManager implements Manager.Adapter {
  readonly name = "pacman"
  private readonly executor: Executor
  private readonly timeouts: Manager.Timeouts
  private cacheUpdated = false

  constructor(opts: Manager.Options) {
    this.executor = opts.executor
    this.timeouts = Manager.timeouts(opts.timeouts)
  }

  async updateCache(): Promise<boolean> {
    const result = await this.executor.execute("pacman -Sy", { sudo: true, timeout: this.timeouts.cache })
    if (result.success) this.cacheUpdated = true
    else Log.warn(`pacman -Sy failed: ${result.status} (exit ${result.exitCode})`)
    return result.success
  }

  async installPackages(packages: string[], onProgress?: Manager.OnProgress): Promise<Manager.InstallResult> {
    if (!this.cacheUpdated) {
      onProgress?.("Synchronizing package databases...")
      await this.updateCache()
    }

    return Manager.installVerified({
      executor: this.executor,
      packages,
      command: (pkgs) => `pacman -S --noconfirm --needed ${pkgs.join(" ")}`,
      timeout: this.timeouts.install,
      onProgress,
      isInstalled: (pkg) => this.isPackageInstalled(pkg),
      explain: Pacman.explain,
    })
  }

  async isPackageInstalled(pkg: string): Promise<boolean> {
    if (!Manager.isValidPackageName(pkg)) return false
    const result = await this.executor.execute(`pacman -Q ${pkg}`)
    return result.exitCode === 0
  }

  async searchPackage(query: string): Promise<Manager.PackageInfo[]> {
    const result = await this.executor.execute(`pacman -Ss ${Shell.quote(query)}`)
    const packages = Pacman.parseSearch(result.stdout)
    Log.parsed("pacman search", { query, count: packages.length })
    return packages
  }

  async getPackageInfo(pkg: string): Promise<Manager.PackageInfo | null> {
    if (!Manager.isValidPackageName(pkg)) return null
    const result = await this.executor.execute(`pacman -Si ${pkg}`)
    if (!result.success) return null
    return {
      name: pkg,
      ...Pacman.parseInfo(result.stdout),
      installed: await this.isPackageInstalled(pkg),
      available: true,
    }
  }

  async upgradeSystem(onProgress?: Manager.OnProgress): Promise<boolean> {
    onProgress?.("Synchronizing package databases...")
    if (!(await this.updateCache())) return false

    onProgress?.("Upgrading packages...")
    const result = await this.executor.execute("pacman -Su --noconfirm", {
      sudo: true,
      timeout: this.timeouts.upgrade,
      onOutput: onProgress,
    })
    return result.success
  }

  parseOutput(output: string): Manager.Progress {
    return Pacman.parseOutput(output)
  }

  installCommand(packages: string[]): string {
    return `pacman -S --needed ${packages.filter(Manager.isValidPackageName).join(" ")}`
  }

  upgradeCommands(): string[] {
    return ["pacman -Syu"]
  }
}
