import yargs from "yargs"
import { hideBin } from "yargs/helpers"
import { InfoCommand } from "./cli/cmd/info"
import { ValidateCommand } from "./cli/cmd/validate"
import { AppsCommand } from "./cli/cmd/apps"
import { InstallCommand } from "./cli/cmd/install"
import { TweaksCommand } from "./cli/cmd/tweaks"
import { ApplyCommand } from "./cli/cmd/apply"
import { UpgradeCommand } from "./cli/cmd/upgrade"
import { SearchCommand } from "./cli/cmd/search"
import { ShowCommand } from "./cli/cmd/show"
import { UI } from "./cli/ui"
import { ConfigLoadError } from "./config/config"
import { DistroDetectionError } from "./detect/distro"
import { PrivilegeError } from "./executor/privilege"
import { Registry } from "./manager/registry"
import { Log } from "./util/log"

const VERSION = "0.1.0"

function hint(err: unknown): string | undefined {
  if (err instanceof PrivilegeError) return "Install sudo (or polkit's pkexec), or run distrokit as root."
  if (err instanceof DistroDetectionError) return "Pass --package-manager to choose a backend explicitly."
  if (err instanceof ConfigLoadError) return "Fix the file above or point --catalog at another catalog directory."
  return undefined
}

Log.init()
Registry.registerBuiltins()

const cli = yargs(hideBin(process.argv))
  .scriptName("distrokit")
  .usage(UI.logo())
  .wrap(100)
  .help("help", "Show help")
  .alias("help", "h")
  .version(VERSION)
  .alias("version", "v")
  .options({
    verbose: {
      type: "boolean",
      describe: "Print debug output (always written to the log file)",
      default: false,
    },
    catalog: {
      type: "string",
      describe: "Directory containing apps/ and tweaks/ catalogs",
    },
    "package-manager": {
      type: "string",
      describe: `Use this backend instead of the detected one (${Registry.names().join(", ")})`,
    },
  })
  .middleware((opts) => {
    if (opts.verbose) Log.setLevel("debug")
    Log.debug(`Log file: ${Log.logFilePath() ?? "disabled"}`)
  })
  .command(InfoCommand)
  .command(ValidateCommand)
  .command(AppsCommand)
  .command(InstallCommand)
  .command(TweaksCommand)
  .command(ApplyCommand)
  .command(UpgradeCommand)
  .command(SearchCommand)
  .command(ShowCommand)
  .demandCommand(1, "Please specify a command. Run --help for usage.")
  .strict()

try {
  await cli.parse()
} catch (err) {
  const message = err instanceof Error ? err.message : String(err)
  Log.error(message)
  const tip = hint(err)
  if (tip) Log.info(tip)
  Log.file(`FATAL ${err instanceof Error ? err.stack ?? message : message}`)
  process.exit(1)
}
