import { Manager } from "./manager"
import { AptManager } from "./managers/apt"
import { DnfManager } from "./managers/dnf"
import { PacmanManager } from "./managers/pacman"
import { ZypperManager } from "./managers/zypper"

export type AdapterFactory = (opts: Manager.Options) => Manager.Adapter

const registry = new Map<string, AdapterFactory>()

export namespace Registry {
  export function register(name: string, factory: AdapterFactory) {
    registry.set(name, factory)
  }

  export function has(name: string): boolean {
    return registry.has(name)
  }

  /** A fresh adapter, or undefined when no backend is registered under that name */
  export function create(name: string, opts: Manager.Options): Manager.Adapter | undefined {
    return registry.get(name)?.(opts)
  }

  export function names(): string[] {
    return Array.from(registry.keys())
  }

  export function clear() {
    registry.clear()
  }

  /** Called once at startup; safe to call again */
  export function registerBuiltins() {
    register("apt", (opts) => new AptManager(opts))
    register("dnf", (opts) => new DnfManager(opts))
    register("pacman", (opts) => new PacmanManager(opts))
    register("zypper", (opts) => new ZypperManager(opts))
  }
}
