import type { CommandModule } from "yargs"
import chalk from "chalk"
import ora from "ora"
import { z } from "zod"
import { Context } from "../context"
import { Catalog } from "../../config/catalog"
import { Terminal } from "../../executor/terminal"
import { Tweaks } from "../../installer/tweaks"
import { Log } from "../../util/log"
import { UI } from "../ui"

const Args = z.object({
  ids: z.array(z.coerce.string()).min(1),
  dryRun: z.boolean().default(false),
})

export const ApplyCommand: CommandModule = {
  command: "apply <ids..>",
  describe: "Apply system tweaks from the catalog",
  builder: (yargs) =>
    yargs
      .positional("ids", {
        type: "string",
        array: true,
        describe: "Tweak ids (see `distrokit tweaks`)",
      })
      .option("dry-run", {
        type: "boolean",
        describe: "Print the commands without running them",
        default: false,
      }),
  handler: async (argv) => {
    const args = Args.parse(argv)
    const session = Context.bootstrap(argv)
    const known = new Map(Catalog.allTweaks(session.catalog.tweaks).map((t) => [t.id, t]))

    for (const id of args.ids.filter((id) => !known.has(id))) Log.warn(`Unknown tweak "${id}"`)
    const tweaks = args.ids.flatMap((id) => known.get(id) ?? [])
    if (tweaks.length === 0) throw new Error("Nothing to apply")

    if (args.dryRun) {
      for (const tweak of tweaks) {
        UI.header(tweak.name)
        if (tweak.verification) console.log(chalk.gray(`  check: ${tweak.verification.check_command}`))
        for (const step of tweak.commands) {
          console.log(`  ${chalk.cyan("$")} ${Terminal.elevated(step.command, true)}`)
        }
      }
      console.log()
      return
    }

    await Context.elevate(session)
    const release = Context.trapInterrupt(session.abort)
    const spinner = ora(`Applying ${tweaks.length} tweak(s)...`).start()
    const result = await Tweaks.apply(tweaks, {
      executor: session.runner,
      timeout: session.tweakTimeout,
      onStatus: (msg) => {
        spinner.text = msg
      },
    }).finally(release)
    Log.parsed("apply:result", result)

    const failed = Object.keys(result.failed).length
    if (failed === 0) spinner.succeed(`Applied ${result.applied.length} tweak(s)`)
    else spinner.warn(`Completed with ${failed} error(s)`)

    console.log(`  ${UI.counts("Applied", result.applied.length, result.skipped.length, failed)}`)
    UI.failures(result.failed)
    if (result.requiresRestart) console.log(chalk.yellow("\n  ⚠ Some changes require a restart to take effect"))
    console.log()
    if (session.abort.signal.aborted) process.exitCode = 130
    else if (failed > 0) process.exitCode = 1
  },
}
