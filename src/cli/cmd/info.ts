import type { CommandModule } from "yargs"
import chalk from "chalk"
import { existsSync } from "fs"
import { join } from "path"
import { Context } from "../context"
import { Catalog } from "../../config/catalog"
import { Config } from "../../config/config"
import { Distro } from "../../detect/distro"
import { Shell } from "../../executor/shell"
import { Registry } from "../../manager/registry"
import { UI } from "../ui"

export const InfoCommand: CommandModule = {
  command: "info",
  describe: "Show the detected distribution and catalog files",
  handler: async (argv) => {
    const { distro, catalogDir } = Context.environment(argv)

    UI.header("System Information")
    UI.table([
      ["Distribution", distro.prettyName],
      ["ID", distro.name],
      ["Version", distro.version || chalk.gray("unknown")],
      ["Codename", distro.codename || chalk.gray("none")],
      ["Similar", distro.idLike.join(", ") || chalk.gray("none")],
      ["Family", family(distro)],
      [
        "Package manager",
        Registry.has(distro.packageManager)
          ? chalk.green(distro.packageManager)
          : chalk.red(`${distro.packageManager} (unsupported)`),
      ],
      ["Elevation", ["sudo", "pkexec"].filter((c) => Shell.has(c)).join(", ") || chalk.red("none")],
      ["Flatpak", Shell.has("flatpak") ? chalk.green("available") : chalk.gray("not installed")],
    ])

    UI.header("Catalog")
    const mark = (file: string | null) => (file ? chalk.green(file) : chalk.gray("none"))
    UI.table([
      ["Directory", catalogDir],
      ["Common apps", mark(exists(join(catalogDir, "apps", "common.yaml")))],
      ["Distro apps", mark(Catalog.distroFile(catalogDir, "apps", distro))],
      ["Common tweaks", mark(exists(join(catalogDir, "tweaks", "common.yaml")))],
      ["Distro tweaks", mark(Catalog.distroFile(catalogDir, "tweaks", distro))],
      ["Settings", mark(Config.find())],
    ])
    console.log()
  },
}

function exists(file: string): string | null {
  return existsSync(file) ? file : null
}

function family(distro: Distro.Info): string {
  if (Distro.isDebianBased(distro)) return "Debian"
  if (Distro.isFedoraBased(distro)) return "Fedora"
  if (Distro.isArchBased(distro)) return "Arch"
  return chalk.gray("other")
}
