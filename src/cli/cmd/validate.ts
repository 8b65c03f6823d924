import type { CommandModule } from "yargs"
import chalk from "chalk"
import { Context } from "../context"
import { Catalog } from "../../config/catalog"
import { Log } from "../../util/log"
import { UI } from "../ui"

export const ValidateCommand: CommandModule = {
  command: "validate",
  describe: "Load and merge the catalogs for this system and report what they contain",
  handler: async (argv) => {
    const { distro, catalogDir } = Context.environment(argv)
    // throws ConfigLoadError naming the file on any schema problem
    const loaded = Catalog.load(distro, catalogDir)
    Log.parsed("catalog", { categories: loaded.apps.categories.length, sections: loaded.tweaks.sections.length })

    UI.header(`Catalog for ${distro.prettyName} (${distro.packageManager})`)
    console.log(chalk.bold(`  ${loaded.apps.categories.length} app categories`))
    for (const cat of loaded.apps.categories) {
      console.log(`    ${cat.icon} ${cat.name}: ${cat.applications.length} app(s)`)
    }
    console.log()
    console.log(chalk.bold(`  ${loaded.tweaks.sections.length} tweak sections`))
    for (const sec of loaded.tweaks.sections) {
      console.log(`    ${sec.icon} ${sec.name}: ${sec.tweaks.length} tweak(s)`)
    }
    console.log()
    Log.success("Catalog is valid")
  },
}
