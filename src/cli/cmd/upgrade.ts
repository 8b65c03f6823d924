import type { CommandModule } from "yargs"
import ora from "ora"
import { z } from "zod"
import { Context } from "../context"
import { Terminal } from "../../executor/terminal"
import { UI } from "../ui"

const Args = z.object({
  interactive: z.boolean().default(false),
})

export const UpgradeCommand: CommandModule = {
  command: "upgrade",
  describe: "Refresh repositories and upgrade every installed package",
  builder: (yargs) =>
    yargs.option("interactive", {
      alias: "i",
      type: "boolean",
      describe: "Run the native upgrade in this terminal after confirmation",
      default: false,
    }),
  handler: async (argv) => {
    const args = Args.parse(argv)
    const session = Context.bootstrap(argv)

    if (args.interactive) {
      const result = await Terminal.confirm(session.adapter.upgradeCommands(), {
        sudo: true,
        description: `System upgrade (${session.distro.prettyName})`,
        warning: "This may take a while and some services may restart.",
      })
      if (!result.success) process.exitCode = result.code
      return
    }

    await Context.elevate(session)
    const release = Context.trapInterrupt(session.abort)
    const spinner = ora("Upgrading system...").start()
    const ok = await session.adapter.upgradeSystem(UI.progress(spinner, session.adapter)).finally(release)
    if (ok) {
      spinner.succeed("System upgraded")
    } else if (session.abort.signal.aborted) {
      spinner.warn("System upgrade cancelled")
      process.exitCode = 130
    } else {
      spinner.fail("System upgrade failed (see the log file for details)")
      process.exitCode = 1
    }
  },
}
