import type { CommandModule } from "yargs"
import chalk from "chalk"
import { z } from "zod"
import { Context } from "../context"
import { Catalog } from "../../config/catalog"
import { UI } from "../ui"

const Args = z.object({
  search: z.string().optional(),
  category: z.string().optional(),
})

export const AppsCommand: CommandModule = {
  command: "apps",
  describe: "List applications available for this system",
  builder: (yargs) =>
    yargs
      .option("search", {
        alias: "s",
        type: "string",
        describe: "Filter by id, name, description or tag",
      })
      .option("category", {
        alias: "c",
        type: "string",
        describe: "Only show one category",
      }),
  handler: async (argv) => {
    const args = Args.parse(argv)
    const { catalog, distro } = Context.bootstrap(argv)

    const query = args.search?.toLowerCase()
    const matches = (app: Catalog.App) =>
      !query ||
      app.id.toLowerCase().includes(query) ||
      app.name.toLowerCase().includes(query) ||
      app.description.toLowerCase().includes(query) ||
      app.tags.some((t) => t.toLowerCase().includes(query))

    let total = 0
    for (const cat of catalog.apps.categories) {
      if (args.category && cat.name.toLowerCase() !== args.category.toLowerCase()) continue
      const apps = cat.applications.filter(matches)
      if (apps.length === 0) continue

      UI.header(`${cat.icon} ${cat.name}`)
      for (const app of apps) {
        const via = distro.packageManager in app.install ? distro.packageManager : "flatpak"
        const tags = app.tags.map((t) => chalk.gray(`#${t}`)).join(" ")
        console.log(`  ${chalk.bold(app.id.padEnd(16))} ${app.name.padEnd(24)} ${chalk.gray(`[${via}]`)} ${chalk.gray(app.description)}`)
        if (tags) console.log(`    ${tags}`)
      }
      total += apps.length
    }

    if (total === 0) {
      console.log(chalk.yellow(args.search ? `No apps matching "${args.search}"` : "No apps in the catalog"))
      return
    }
    console.log()
    console.log(chalk.gray(`  Total: ${total} app(s)`))
    console.log()
  },
}
