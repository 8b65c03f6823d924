import type { CommandModule } from "yargs"
import chalk from "chalk"
import { z } from "zod"
import { Context } from "../context"
import { UI } from "../ui"

const Args = z.object({
  section: z.string().optional(),
})

export const TweaksCommand: CommandModule = {
  command: "tweaks",
  describe: "List system tweaks available for this system",
  builder: (yargs) =>
    yargs.option("section", {
      alias: "s",
      type: "string",
      describe: "Only show one section",
    }),
  handler: async (argv) => {
    const args = Args.parse(argv)
    const { catalog } = Context.bootstrap(argv)

    const sections = catalog.tweaks.sections.filter(
      (s) => !args.section || s.name.toLowerCase() === args.section.toLowerCase(),
    )
    if (sections.length === 0) {
      console.log(chalk.yellow(args.section ? `No tweak section "${args.section}"` : "No tweaks in the catalog"))
      return
    }

    for (const sec of sections) {
      UI.header(`${sec.icon} ${sec.name}`)
      for (const tweak of sec.tweaks) {
        const flags = [
          tweak.requires_restart ? chalk.yellow("restart") : "",
          tweak.verification ? chalk.gray("verifiable") : "",
        ].filter(Boolean)
        console.log(`  ${chalk.bold(tweak.id.padEnd(24))} ${tweak.name} ${flags.join(" ")}`)
        if (tweak.description) console.log(`    ${chalk.gray(tweak.description)}`)
        if (tweak.dependencies.length > 0) console.log(`    ${chalk.gray(`after: ${tweak.dependencies.join(", ")}`)}`)
      }
    }
    console.log()
  },
}
