import type { Catalog } from "../config/catalog"
import type { Executor } from "../executor/runner"
import { Apps } from "./apps"
import { Log } from "../util/log"

export namespace Tweaks {
  export interface Context {
    executor: Executor
    /** per step, milliseconds */
    timeout: number
    onStatus?: (message: string) => void
  }

  export interface Result {
    applied: string[]
    /** already in place according to their verification */
    skipped: string[]
    /** tweak id → reason */
    failed: Record<string, string>
    /** an applied tweak asks for a restart */
    requiresRestart: boolean
  }

  /** True when the tweak's verification says it is already in place */
  export async function isApplied(tweak: Catalog.Tweak, executor: Executor): Promise<boolean> {
    const check = tweak.verification
    if (!check || !tweak.idempotent) return false
    const res = await executor.execute(check.check_command)
    return new RegExp(check.success_regex, "m").test(res.stdout)
  }

  /**
   * Apply tweaks in order. Each tweak's steps run elevated and stop at the
   * first failure; the remaining tweaks still run.
   */
  export async function apply(tweaks: Catalog.Tweak[], ctx: Context): Promise<Result> {
    const result: Result = { applied: [], skipped: [], failed: {}, requiresRestart: false }

    for (const [i, tweak] of tweaks.entries()) {
      ctx.onStatus?.(`[${i + 1}/${tweaks.length}] Applying: ${tweak.name}...`)

      if (await isApplied(tweak, ctx.executor)) {
        ctx.onStatus?.(`Skipped: ${tweak.name} (already applied)`)
        result.skipped.push(tweak.id)
        continue
      }

      let failure: string | undefined
      for (const step of tweak.commands) {
        if (step.description) ctx.onStatus?.(`  ${step.description}...`)
        const res = await ctx.executor.execute(step.command, { sudo: true, timeout: ctx.timeout })
        if (!res.success) {
          failure = Apps.reason(res.stderr, res.status, res.exitCode)
          break
        }
      }

      if (failure !== undefined) {
        Log.file(`[Tweaks] ${tweak.id} failed: ${failure}`)
        ctx.onStatus?.(`Failed: ${tweak.name} - ${failure}`)
        result.failed[tweak.id] = failure
        continue
      }

      ctx.onStatus?.(`Applied: ${tweak.name}`)
      result.applied.push(tweak.id)
      if (tweak.requires_restart) result.requiresRestart = true
    }

    return result
  }
}
