import { existsSync } from "fs"
import { dirname, join, resolve } from "path"
import { fileURLToPath } from "url"
import { Config } from "./config"
import { AppCatalog, TweakCatalog, type AppEntry, type TweakEntry } from "./schema"
import type { Distro } from "../detect/distro"
import { Log } from "../util/log"

export namespace Catalog {
  export interface App extends AppEntry {
    /** owning category name */
    category: string
  }

  export interface Category {
    name: string
    icon: string
    applications: App[]
  }

  export interface Tweak extends TweakEntry {
    /** owning section name */
    section: string
  }

  export interface Section {
    name: string
    icon: string
    tweaks: Tweak[]
  }

  export interface Apps {
    categories: Category[]
  }

  export interface Tweaks {
    distro: string
    compatibleVersions: string[]
    sections: Section[]
  }

  export interface Loaded {
    apps: Apps
    tweaks: Tweaks
    distro: Distro.Info
    /** which distro-specific file names were used, for display */
    files: { apps: string | null; tweaks: string | null }
  }

  /** Bundled catalog shipped next to the sources */
  export function defaultDir(): string {
    return resolve(dirname(fileURLToPath(import.meta.url)), "..", "..", "data")
  }

  /** A missing file is an empty catalog */
  export function loadApps(file: string): AppCatalog {
    if (!existsSync(file)) return AppCatalog.parse({})
    return Config.read(file, AppCatalog)
  }

  export function loadTweaks(file: string): TweakCatalog {
    if (!existsSync(file)) return TweakCatalog.parse({})
    return Config.read(file, TweakCatalog)
  }

  export function supports(app: AppEntry, packageManager: string): boolean {
    return packageManager in app.install || "flatpak" in app.install
  }

  /**
   * Common catalog first, then the distro one. Apps that support neither the
   * package manager nor flatpak are dropped, a repeated id is dropped (first
   * occurrence wins), empty categories are omitted.
   */
  export function mergeApps(common: AppCatalog, distro: AppCatalog, packageManager: string): Apps {
    const categories = new Map<string, Category>()
    const seen = new Set<string>()

    for (const source of [common, distro]) {
      for (const cat of source.categories) {
        let merged = categories.get(cat.name)
        if (!merged) {
          merged = { name: cat.name, icon: cat.icon, applications: [] }
          categories.set(cat.name, merged)
        }
        for (const app of cat.applications) {
          if (!supports(app, packageManager) || seen.has(app.id)) continue
          seen.add(app.id)
          merged.applications.push({ ...app, category: cat.name })
        }
      }
    }

    return { categories: [...categories.values()].filter((c) => c.applications.length > 0) }
  }

  /**
   * Distro sections first; a common tweak is appended to its section only
   * when that section does not already hold its id. Empty sections omitted.
   */
  export function mergeTweaks(common: TweakCatalog, distro: TweakCatalog): Tweaks {
    const sections = new Map<string, Section>()

    for (const sec of distro.sections) {
      const merged = sections.get(sec.name) ?? { name: sec.name, icon: sec.icon, tweaks: [] }
      sections.set(sec.name, merged)
      merged.tweaks.push(...sec.tweaks.map((t) => ({ ...t, section: sec.name })))
    }

    for (const sec of common.sections) {
      const merged = sections.get(sec.name) ?? { name: sec.name, icon: sec.icon, tweaks: [] }
      sections.set(sec.name, merged)
      const ids = new Set(merged.tweaks.map((t) => t.id))
      for (const tweak of sec.tweaks) {
        if (ids.has(tweak.id)) continue
        ids.add(tweak.id)
        merged.tweaks.push({ ...tweak, section: sec.name })
      }
    }

    return {
      distro: distro.distro,
      compatibleVersions: distro.compatible_versions,
      sections: [...sections.values()].filter((s) => s.tweaks.length > 0),
    }
  }

  /** `<kind>/<distro>.yaml`, else the first similar distro that has one */
  export function distroFile(dir: string, kind: "apps" | "tweaks", distro: Distro.Info): string | null {
    for (const id of [distro.name, ...distro.idLike]) {
      const file = join(dir, kind, `${id}.yaml`)
      if (existsSync(file)) return file
    }
    return null
  }

  export function load(distro: Distro.Info, dir: string = defaultDir()): Loaded {
    const appsFile = distroFile(dir, "apps", distro)
    const tweaksFile = distroFile(dir, "tweaks", distro)
    Log.stage("Catalog:load", `${dir} apps=${appsFile ?? "-"} tweaks=${tweaksFile ?? "-"}`)

    const apps = mergeApps(
      loadApps(join(dir, "apps", "common.yaml")),
      appsFile ? loadApps(appsFile) : AppCatalog.parse({}),
      distro.packageManager,
    )
    const tweaks = mergeTweaks(
      loadTweaks(join(dir, "tweaks", "common.yaml")),
      tweaksFile ? loadTweaks(tweaksFile) : TweakCatalog.parse({}),
    )

    if (tweaks.compatibleVersions.length > 0 && distro.version && !tweaks.compatibleVersions.includes(distro.version)) {
      Log.warn(
        `Tweaks for ${tweaks.distro || distro.name} are tested on ${tweaks.compatibleVersions.join(", ")}, this is ${distro.version}`,
      )
    }

    return { apps, tweaks, distro, files: { apps: appsFile, tweaks: tweaksFile } }
  }

  export function allApps(apps: Apps): App[] {
    return apps.categories.flatMap((c) => c.applications)
  }

  export function allTweaks(tweaks: Tweaks): Tweak[] {
    return tweaks.sections.flatMap((s) => s.tweaks)
  }
}
