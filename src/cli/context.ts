import { z } from "zod"
import { Catalog } from "../config/catalog"
import { Config } from "../config/config"
import type { Settings } from "../config/schema"
import { Distro } from "../detect/distro"
import { CommandRunner } from "../executor/runner"
import { Manager } from "../manager/manager"
import { Registry } from "../manager/registry"
import { Log } from "../util/log"

/** Shared per-invocation setup for the commands */
export namespace Context {
  export const Globals = z.object({
    catalog: z.string().optional(),
    packageManager: z.string().optional(),
  })

  export interface Session {
    distro: Distro.Info
    settings: Settings
    catalogDir: string
    catalog: Catalog.Loaded
    runner: CommandRunner
    /** Fired by Ctrl+C once trapInterrupt is active; the runner listens to it */
    abort: AbortController
    adapter: Manager.Adapter
    /** milliseconds */
    tweakTimeout: number
  }

  /** Distro and settings only; no catalog or adapter needed */
  export function environment(argv: unknown): { distro: Distro.Info; settings: Settings; catalogDir: string } {
    const globals = Globals.parse(argv)
    const settings = Config.resolve({ catalog: globals.catalog, packageManager: globals.packageManager })
    const detected = Distro.detect()
    const distro = settings.package_manager ? { ...detected, packageManager: settings.package_manager } : detected
    Log.parsed("distro", distro)
    return { distro, settings, catalogDir: settings.catalog ?? Catalog.defaultDir() }
  }

  export function bootstrap(argv: unknown): Session {
    const { distro, settings, catalogDir } = environment(argv)
    const abort = new AbortController()
    const runner = new CommandRunner({ signal: abort.signal })
    const timeouts = settings.timeouts

    const adapter = Registry.create(distro.packageManager, {
      executor: runner,
      timeouts: {
        cache: timeouts.cache * 1000,
        install: timeouts.install * 1000,
        upgrade: timeouts.upgrade * 1000,
      },
    })
    if (!adapter) {
      throw new Error(
        `Package manager ${distro.packageManager} is not supported (available: ${Registry.names().join(", ")})`,
      )
    }

    return {
      distro,
      settings,
      catalogDir,
      catalog: Catalog.load(distro, catalogDir),
      runner,
      abort,
      adapter,
      tweakTimeout: timeouts.tweak * 1000,
    }
  }

  /**
   * Ask for elevation before a spinner takes over the terminal, so a sudo
   * password prompt stays visible.
   */
  export async function elevate(session: Session) {
    const privilege = session.runner.privilege
    // pkexec asks per command, there is nothing to request up front
    if (privilege.canElevate() && !privilege.hasSudo) return
    if (await privilege.checkPrivileges()) return
    Log.info("Administrator privileges are required")
    await privilege.requestElevation()
  }

  /**
   * The first Ctrl+C aborts the controller, which kills the running
   * command's process group and lets the flow finish with the rest marked
   * cancelled. A second one exits right away. Returns the uninstaller.
   */
  export function trapInterrupt(controller: AbortController): () => void {
    let presses = 0
    const onInterrupt = () => {
      presses++
      if (presses > 1) process.exit(130)
      Log.warn("Interrupted, cancelling the running command (press Ctrl+C again to quit)")
      controller.abort()
    }
    process.on("SIGINT", onInterrupt)
    return () => {
      process.off("SIGINT", onInterrupt)
    }
  }
}
