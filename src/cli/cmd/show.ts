import type { CommandModule } from "yargs"
import chalk from "chalk"
import { z } from "zod"
import { Context } from "../context"
import { UI } from "../ui"

const Args = z.object({
  package: z.coerce.string().min(1),
})

export const ShowCommand: CommandModule = {
  command: "show <package>",
  describe: "Show details about one package",
  builder: (yargs) => yargs.positional("package", { type: "string", describe: "Package name" }),
  handler: async (argv) => {
    const args = Args.parse(argv)
    const { adapter } = Context.bootstrap(argv)

    const info = await adapter.getPackageInfo(args.package)
    if (!info) {
      console.log(chalk.yellow(`Package "${args.package}" not found`))
      process.exitCode = 1
      return
    }

    UI.header(info.name)
    UI.table([
      ["Version", info.version || chalk.gray("unknown")],
      ["Installed", info.installed ? chalk.green("yes") : "no"],
      ["Description", info.description || chalk.gray("none")],
    ])
    console.log()
  },
}
