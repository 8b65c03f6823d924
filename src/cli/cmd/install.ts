import type { CommandModule } from "yargs"
import chalk from "chalk"
import ora from "ora"
import { z } from "zod"
import { Context } from "../context"
import { Catalog } from "../../config/catalog"
import { Terminal } from "../../executor/terminal"
import { Apps } from "../../installer/apps"
import { Log } from "../../util/log"
import { UI } from "../ui"

const Args = z.object({
  ids: z.array(z.coerce.string()).min(1),
  dryRun: z.boolean().default(false),
  interactive: z.boolean().default(false),
})

export const InstallCommand: CommandModule = {
  command: "install <ids..>",
  describe: "Install applications from the catalog",
  builder: (yargs) =>
    yargs
      .positional("ids", {
        type: "string",
        array: true,
        describe: "App ids (see `distrokit apps`)",
      })
      .option("dry-run", {
        type: "boolean",
        describe: "Print the commands without running them",
        default: false,
      })
      .option("interactive", {
        alias: "i",
        type: "boolean",
        describe: "Run the native commands in this terminal after confirmation",
        default: false,
      }),
  handler: async (argv) => {
    const args = Args.parse(argv)
    const session = Context.bootstrap(argv)
    const known = new Map(Catalog.allApps(session.catalog.apps).map((a) => [a.id, a]))

    const unknown = args.ids.filter((id) => !known.has(id))
    for (const id of unknown) Log.warn(`Unknown app "${id}" (not in the catalog for ${session.distro.name})`)
    const apps = args.ids.flatMap((id) => known.get(id) ?? [])
    if (apps.length === 0) throw new Error("Nothing to install")

    const ctx = {
      adapter: session.adapter,
      executor: session.runner,
      packageManager: session.distro.packageManager,
      flatpakRemote: session.settings.flatpak_remote,
      timeout: session.settings.timeouts.install * 1000,
    }
    const steps = Apps.commands(apps, ctx)

    if (args.dryRun) {
      UI.header("Commands")
      for (const step of steps) console.log(`  ${chalk.cyan("$")} ${Terminal.elevated(step.command, step.sudo)}`)
      console.log()
      return
    }

    if (args.interactive) {
      const result = await Terminal.confirm(
        steps.map((s) => Terminal.elevated(s.command, s.sudo)),
        { description: `Installing ${apps.length} app(s): ${apps.map((a) => a.name).join(", ")}` },
      )
      if (!result.success) process.exitCode = result.code
      return
    }

    await Context.elevate(session)
    const release = Context.trapInterrupt(session.abort)
    const spinner = ora(`Installing ${apps.length} app(s)...`).start()
    const result = await Apps.install(apps, {
      ...ctx,
      onProgress: UI.progress(spinner, session.adapter),
      onStatus: (msg) => {
        spinner.text = msg
      },
    }).finally(release)
    Log.parsed("install:result", result)

    const failed = Object.keys(result.failed).length
    if (failed === 0) spinner.succeed(`Installed ${result.installed.length} app(s)`)
    else spinner.warn(`Installed ${result.installed.length}, failed ${failed}`)

    console.log(`  ${UI.counts("Installed", result.installed.length, result.skipped.length, failed)}`)
    UI.failures(result.failed)
    if (result.skipped.length > 0) {
      console.log(chalk.gray(`  No install method on this system: ${result.skipped.join(", ")}`))
    }
    console.log()
    if (session.abort.signal.aborted) process.exitCode = 130
    else if (failed > 0) process.exitCode = 1
  },
}
