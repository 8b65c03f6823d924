import chalk from "chalk"
import type { Ora } from "ora"
import type { Manager } from "../manager/manager"

export namespace UI {
  export function logo(): string {
    return chalk.bold.cyan(`
  ╔═══════════════════════════════════════╗
  ║           🐧 distrokit                ║
  ║   Linux post-install apps & tweaks    ║
  ╚═══════════════════════════════════════╝
    `)
  }

  export function header(text: string) {
    console.log()
    console.log(chalk.bold.underline(text))
    console.log()
  }

  export function table(rows: [string, string][]) {
    if (rows.length === 0) return
    const maxKey = Math.max(...rows.map(([k]) => k.length))
    for (const [key, value] of rows) {
      console.log(`  ${chalk.gray(key.padEnd(maxKey))}  ${value}`)
    }
  }

  /** `✔ Applied: 2, ⊘ Skipped: 1, ✖ Failed: 1` */
  export function counts(label: string, ok: number, skipped: number, failed: number): string {
    let line = chalk.green(`✔ ${label}: ${ok}`)
    if (skipped > 0) line += chalk.gray(`, ⊘ Skipped: ${skipped}`)
    if (failed > 0) line += chalk.red(`, ✖ Failed: ${failed}`)
    return line
  }

  export function failures(failed: Record<string, string>) {
    for (const [id, reason] of Object.entries(failed)) {
      console.log(`  ${chalk.red("•")} ${chalk.bold(id)}: ${chalk.gray(reason)}`)
    }
  }

  /** Feed package manager output lines into a spinner */
  export function progress(spinner: Ora, adapter: Manager.Adapter): Manager.OnProgress {
    return (line) => {
      const info = adapter.parseOutput(line)
      if (info.currentAction) {
        spinner.text = info.progress === null ? info.currentAction : `${info.currentAction} (${info.progress}%)`
      } else if (line.endsWith("...")) {
        spinner.text = line
      }
    }
  }
}
