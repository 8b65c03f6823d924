import type { Catalog } from "../config/catalog"
import type { InstallMethod } from "../config/schema"
import type { Executor } from "../executor/runner"
import { Shell } from "../executor/shell"
import { Manager } from "../manager/manager"
import { Log } from "../util/log"

export namespace Apps {
  export interface Context {
    adapter: Manager.Adapter
    executor: Executor
    /** key looked up in each app's install map */
    packageManager: string
    flatpakRemote: string
    /** milliseconds, for custom and flatpak commands */
    timeout: number
    /** live output lines */
    onProgress?: Manager.OnProgress
    /** one human readable status line per step */
    onStatus?: (message: string) => void
  }

  export interface Result {
    installed: string[]
    /** apps without an install method for this system */
    skipped: string[]
    /** app id → reason */
    failed: Record<string, string>
    /** the combined native install, when there was one */
    packages?: Manager.InstallResult
  }

  export type Plan =
    | { kind: "native"; app: Catalog.App; packages: string[] }
    | { kind: "flatpak"; app: Catalog.App; ids: string[] }
    | { kind: "custom"; app: Catalog.App; method: InstallMethod }
    | { kind: "skip"; app: Catalog.App }

  /** Prefer the package manager's own entry, fall back to flatpak */
  export function plan(app: Catalog.App, packageManager: string): Plan {
    const native = app.install[packageManager]
    const method = native ?? app.install["flatpak"]
    if (!method) return { kind: "skip", app }
    if (method.method === "custom") {
      return method.commands.length > 0 ? { kind: "custom", app, method } : { kind: "skip", app }
    }
    if (method.packages.length === 0) return { kind: "skip", app }
    return native ? { kind: "native", app, packages: method.packages } : { kind: "flatpak", app, ids: method.packages }
  }

  export function flatpakCommand(remote: string, ids: string[]): string {
    return `flatpak install -y --noninteractive ${Shell.quote(remote)} ${ids.join(" ")}`
  }

  export interface Step {
    command: string
    sudo: boolean
  }

  /**
   * Shell commands that would install the apps, for dry runs and for the
   * interactive path where the native tool asks for confirmation itself.
   */
  export function commands(apps: Catalog.App[], ctx: Pick<Context, "adapter" | "packageManager" | "flatpakRemote">): Step[] {
    const plans = apps.map((a) => plan(a, ctx.packageManager))
    const out: Step[] = []

    const packages = plans.flatMap((p) => (p.kind === "native" ? p.packages : []))
    if (packages.length > 0) out.push({ command: ctx.adapter.installCommand(packages), sudo: true })

    for (const p of plans) {
      if (p.kind === "flatpak") {
        out.push({ command: flatpakCommand(ctx.flatpakRemote, p.ids.filter(Manager.isValidPackageName)), sudo: true })
      }
      if (p.kind === "custom") out.push(...p.method.commands.map((command) => ({ command, sudo: p.method.sudo })))
    }
    return out
  }

  /**
   * Install catalog apps. Native packages of all apps go through one adapter
   * call; flatpak and custom apps run one by one. A failing app never stops
   * the others.
   */
  export async function install(apps: Catalog.App[], ctx: Context): Promise<Result> {
    const result: Result = { installed: [], skipped: [], failed: {} }
    const plans = apps.map((a) => plan(a, ctx.packageManager))
    Log.stage("Apps:install", `${apps.length} app(s) via ${ctx.packageManager}`)

    const native = plans.flatMap((p) => (p.kind === "native" ? [p] : []))
    if (native.length > 0) {
      const packages = native.flatMap((p) => p.packages)
      ctx.onStatus?.(`Installing ${packages.length} package(s)...`)
      const res = await ctx.adapter.installPackages(packages, ctx.onProgress)
      result.packages = res

      const done = new Set(res.packagesInstalled)
      for (const p of native) {
        const missing = p.packages.filter((pkg) => !done.has(pkg))
        const first = missing[0]
        if (first === undefined) result.installed.push(p.app.id)
        else result.failed[p.app.id] = `${first}: ${res.errors[first] ?? "Installation failed"}`
      }
    }

    for (const p of plans) {
      if (p.kind === "skip") {
        Log.debug(`No install method for ${p.app.id} on ${ctx.packageManager}`)
        result.skipped.push(p.app.id)
      } else if (p.kind === "flatpak") {
        await flatpak(p.app, p.ids, ctx, result)
      } else if (p.kind === "custom") {
        await custom(p.app, p.method, ctx, result)
      }
    }

    return result
  }

  async function flatpak(app: Catalog.App, ids: string[], ctx: Context, result: Result) {
    const invalid = ids.find((id) => !Manager.isValidPackageName(id))
    if (invalid !== undefined) {
      result.failed[app.id] = `${invalid}: Invalid package name`
      return
    }

    ctx.onStatus?.(`Installing ${app.name} from ${ctx.flatpakRemote}...`)
    const res = await ctx.executor.execute(flatpakCommand(ctx.flatpakRemote, ids), {
      sudo: true,
      timeout: ctx.timeout,
      onOutput: ctx.onProgress,
    })
    if (res.success) result.installed.push(app.id)
    else result.failed[app.id] = reason(res.stderr, res.status, res.exitCode)
  }

  async function custom(app: Catalog.App, method: InstallMethod, ctx: Context, result: Result) {
    ctx.onStatus?.(`Running ${method.commands.length} command(s) for ${app.name}...`)
    const results = await ctx.executor.executeMultiple(method.commands, {
      sudo: method.sudo,
      timeout: ctx.timeout,
      stopOnError: true,
    })

    const bad = results.find((r) => !r.success)
    if (bad) result.failed[app.id] = reason(bad.stderr, bad.status, bad.exitCode)
    else result.installed.push(app.id)
  }

  export function reason(stderr: string, status: string, exitCode: number): string {
    const text = stderr.trim().slice(0, 100)
    if (status === "timeout") return "Timed out"
    if (status === "cancelled") return "Cancelled"
    return text || `Exited with code ${exitCode}`
  }
}
