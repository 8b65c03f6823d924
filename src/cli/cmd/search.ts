import type { CommandModule } from "yargs"
import chalk from "chalk"
import ora from "ora"
import { z } from "zod"
import { Context } from "../context"
import { UI } from "../ui"

const Args = z.object({
  query: z.coerce.string().min(1),
  limit: z.number().int().positive().default(30),
})

export const SearchCommand: CommandModule = {
  command: "search <query>",
  describe: "Search the package manager's repositories",
  builder: (yargs) =>
    yargs
      .positional("query", { type: "string", describe: "Search term" })
      .option("limit", { type: "number", describe: "Maximum results to show", default: 30 }),
  handler: async (argv) => {
    const args = Args.parse(argv)
    const { adapter } = Context.bootstrap(argv)

    const spinner = ora(`Searching ${adapter.name} for "${args.query}"...`).start()
    const packages = await adapter.searchPackage(args.query)
    spinner.stop()

    if (packages.length === 0) {
      console.log(chalk.yellow(`No packages matching "${args.query}"`))
      return
    }

    UI.header(`Results (${packages.length})`)
    for (const pkg of packages.slice(0, args.limit)) {
      const icon = pkg.installed ? chalk.green("✔") : chalk.gray("○")
      console.log(`  ${icon} ${chalk.bold(pkg.name)} ${chalk.gray(pkg.version)}`)
      if (pkg.description) console.log(`    ${chalk.gray(pkg.description)}`)
    }
    if (packages.length > args.limit) console.log(chalk.gray(`\n  ... ${packages.length - args.limit} more`))
    console.log()
  },
}
