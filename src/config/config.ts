import { existsSync, readFileSync } from "fs"
import { dirname, isAbsolute, join } from "path"
import YAML from "yaml"
import type { ZodType, ZodTypeDef } from "zod"
import { Settings } from "./schema"

const CONFIG_NAMES = ["distrokit.yaml", "distrokit.yml", "distrokit.json", ".distrokit.yaml", ".distrokit.yml"]

/** A settings or catalog file that cannot be read, parsed or validated */
export class ConfigLoadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigLoadError"
  }
}

export namespace Config {
  /** Values that win over the settings file (CLI flags) */
  export interface Overrides {
    catalog?: string
    packageManager?: string
  }

  /** Find the settings file, walking up from dir */
  export function find(dir?: string): string | null {
    let current = dir || process.cwd()

    while (true) {
      for (const name of CONFIG_NAMES) {
        const filepath = join(current, name)
        if (existsSync(filepath)) return filepath
      }

      const parent = join(current, "..")
      if (parent === current) break
      current = parent
    }

    return null
  }

  /** Find and load settings from a directory (walks up to find it) */
  export function load(dir?: string): Settings | null {
    const filepath = find(dir)
    return filepath ? parse(filepath) : null
  }

  /**
   * Read a YAML or JSON document and validate it. An empty document counts
   * as `{}` so every default applies.
   */
  export function read<Out>(filepath: string, schema: ZodType<Out, ZodTypeDef, unknown>): Out {
    let raw: unknown
    try {
      const content = readFileSync(filepath, "utf-8")
      raw = filepath.endsWith(".json") ? JSON.parse(content) : YAML.parse(content)
    } catch (err) {
      throw new ConfigLoadError(`Error loading ${filepath}: ${err instanceof Error ? err.message : String(err)}`)
    }

    const result = schema.safeParse(raw ?? {})
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      throw new ConfigLoadError(`Invalid ${filepath}: ${issues.join("; ")}`)
    }
    return result.data
  }

  /** Parse a settings file. A relative `catalog` is taken from the file's directory. */
  export function parse(filepath: string): Settings {
    const settings = read(filepath, Settings)
    if (settings.catalog && !isAbsolute(settings.catalog)) {
      return { ...settings, catalog: join(dirname(filepath), settings.catalog) }
    }
    return settings
  }

  /** Get the global config directory */
  export function globalDir(): string {
    const xdg = process.env.XDG_CONFIG_HOME
    if (xdg) return join(xdg, "distrokit")
    const home = process.env.HOME || "~"
    return join(home, ".config", "distrokit")
  }

  /** Load global settings (~/.config/distrokit/config.yaml) */
  export function loadGlobal(): Settings | null {
    const dir = globalDir()
    for (const name of ["config.yaml", "config.yml", "config.json"]) {
      const filepath = join(dir, name)
      if (existsSync(filepath)) return parse(filepath)
    }
    return null
  }

  /**
   * Resolve settings with priority:
   * 1. CLI overrides
   * 2. Project file (distrokit.yaml, walking up from cwd)
   * 3. Global file (~/.config/distrokit/config.yaml)
   * 4. Defaults
   */
  export function resolve(overrides: Overrides = {}, dir?: string): Settings {
    const base = load(dir) ?? loadGlobal() ?? Settings.parse({})
    return {
      ...base,
      catalog: overrides.catalog ?? base.catalog,
      package_manager: overrides.packageManager ?? base.package_manager,
    }
  }
}
