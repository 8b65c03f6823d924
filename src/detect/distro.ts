import { execFileSync } from "child_process"
import { existsSync, readFileSync } from "fs"
import { Shell } from "../executor/shell"
import { Log } from "../util/log"

export class DistroDetectionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "DistroDetectionError"
  }
}

const PACKAGE_MANAGERS: Record<string, string> = {
  ubuntu: "apt",
  debian: "apt",
  linuxmint: "apt",
  pop: "apt",
  fedora: "dnf",
  rhel: "dnf",
  centos: "dnf",
  rocky: "dnf",
  almalinux: "dnf",
  arch: "pacman",
  manjaro: "pacman",
  endeavouros: "pacman",
  opensuse: "zypper",
  "opensuse-tumbleweed": "zypper",
  "opensuse-leap": "zypper",
}

const LOOKUP_ORDER = ["apt", "dnf", "pacman", "zypper"]

export namespace Distro {
  export interface Info {
    /** lower-cased ID, e.g. ubuntu */
    readonly name: string
    readonly version: string
    readonly codename: string
    readonly prettyName: string
    readonly packageManager: string
    /** ID_LIKE, e.g. ["rhel", "fedora"] */
    readonly idLike: readonly string[]
  }

  export interface DetectOptions {
    osReleasePaths?: string[]
    has?: (cmd: string) => boolean
    /** Output of `lsb_release -a` */
    lsbRelease?: () => string
  }

  export const OS_RELEASE_PATHS = ["/etc/os-release", "/usr/lib/os-release"]

  /** KEY=value lines; comments and blanks skipped, quotes stripped */
  export function parseOsRelease(text: string): Record<string, string> {
    const out: Record<string, string> = {}
    for (const raw of text.split("\n")) {
      const line = raw.trim()
      if (!line || line.startsWith("#")) continue
      const idx = line.indexOf("=")
      if (idx <= 0) continue
      const value = line.slice(idx + 1).trim().replace(/^["']+|["']+$/g, "")
      out[line.slice(0, idx)] = value
    }
    return out
  }

  export function packageManagerFor(name: string, idLike: readonly string[], has: (cmd: string) => boolean = Shell.has): string {
    const direct = PACKAGE_MANAGERS[name]
    if (direct) return direct

    for (const similar of idLike) {
      const pm = PACKAGE_MANAGERS[similar]
      if (pm) return pm
    }

    const found = LOOKUP_ORDER.find((cmd) => has(cmd))
    if (found) return found

    throw new DistroDetectionError(`Could not determine package manager for distribution: ${name}`)
  }

  export function fromOsRelease(fields: Record<string, string>, has?: (cmd: string) => boolean): Info {
    const name = (fields["ID"] ?? "").toLowerCase()
    if (!name) throw new DistroDetectionError("Could not determine distribution ID")
    const idLike = (fields["ID_LIKE"] ?? "").split(/\s+/).filter(Boolean)

    return {
      name,
      version: fields["VERSION_ID"] ?? "",
      codename: fields["VERSION_CODENAME"] ?? "",
      prettyName: fields["PRETTY_NAME"] || name,
      packageManager: packageManagerFor(name, idLike, has),
      idLike,
    }
  }

  export function parseLsbRelease(output: string, has?: (cmd: string) => boolean): Info {
    const value = (label: string) => {
      const line = output.split("\n").find((l) => l.includes(`${label}:`))
      return line ? line.slice(line.indexOf(":") + 1).trim() : ""
    }

    const name = value("Distributor ID").toLowerCase()
    if (!name) throw new DistroDetectionError("lsb_release did not provide distribution ID")

    return {
      name,
      version: value("Release"),
      codename: value("Codename"),
      prettyName: value("Description") || name,
      packageManager: packageManagerFor(name, [], has),
      idLike: [],
    }
  }

  function runLsbRelease(): string {
    try {
      return execFileSync("lsb_release", ["-a"], { encoding: "utf-8", stdio: ["ignore", "pipe", "ignore"] })
    } catch (err) {
      throw new DistroDetectionError(`lsb_release command failed: ${err instanceof Error ? err.message : String(err)}`)
    }
  }

  export function detect(opts: DetectOptions = {}): Info {
    const has = opts.has ?? Shell.has
    const path = (opts.osReleasePaths ?? OS_RELEASE_PATHS).find((p) => existsSync(p))

    if (path) {
      let text: string
      try {
        text = readFileSync(path, "utf-8")
      } catch (err) {
        throw new DistroDetectionError(`Error detecting distribution: ${err instanceof Error ? err.message : String(err)}`)
      }
      const info = fromOsRelease(parseOsRelease(text), has)
      Log.stage("Distro:detect", `${path} → ${info.name} ${info.version} (${info.packageManager})`)
      return info
    }

    if (opts.lsbRelease || has("lsb_release")) {
      const info = parseLsbRelease((opts.lsbRelease ?? runLsbRelease)(), has)
      Log.stage("Distro:detect", `lsb_release → ${info.name} ${info.version} (${info.packageManager})`)
      return info
    }

    throw new DistroDetectionError("Could not find /etc/os-release or lsb_release command")
  }

  export function describe(info: Info): string {
    return `${info.prettyName} (${info.packageManager})`
  }

  export function isDebianBased(info: Info): boolean {
    return ["ubuntu", "debian"].includes(info.name) || info.idLike.includes("debian")
  }

  export function isFedoraBased(info: Info): boolean {
    return ["fedora", "rhel", "centos"].includes(info.name) || info.idLike.includes("fedora")
  }

  export function isArchBased(info: Info): boolean {
    return ["arch", "manjaro"].includes(info.name) || info.idLike.includes("arch")
  }
}
