import { z } from "zod"

const Pattern = z.string().refine(
  (s) => {
    try {
      new RegExp(s)
      return true
    } catch {
      return false
    }
  },
  { message: "Invalid regular expression" },
)

export const InstallMethod = z.object({
  method: z.enum(["native", "custom"]).default("native"),
  packages: z.array(z.string()).default([]).describe("Package names for the native package manager or flatpak ids"),
  commands: z.array(z.string()).default([]).describe("Shell commands for custom installs, run in order"),
  sudo: z.boolean().default(false).describe("Run custom commands elevated"),
})

export const AppEntry = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().default(""),
  install: z.record(z.string(), InstallMethod).describe("Package manager name (or flatpak) → install method"),
  tags: z.array(z.string()).default([]),
})

export const AppCategory = z.object({
  name: z.string().min(1),
  icon: z.string().default("📦"),
  applications: z.array(AppEntry).default([]),
})

export const AppCatalog = z.object({
  categories: z.array(AppCategory).default([]),
})

export const TweakStep = z.object({
  command: z.string().min(1),
  description: z.string().default(""),
})

export const Verification = z
  .object({
    check_command: z.string().min(1),
    success_regex: Pattern.optional(),
    success_pattern: Pattern.optional().describe("Older name of success_regex"),
  })
  .transform((v, ctx) => {
    const regex = v.success_regex ?? v.success_pattern
    if (regex === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "success_regex is required" })
      return z.NEVER
    }
    return { check_command: v.check_command, success_regex: regex }
  })

export const TweakEntry = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().default(""),
  category: z.string().default(""),
  commands: z.array(TweakStep).default([]),
  requires_restart: z.boolean().default(false),
  idempotent: z.boolean().default(true),
  dependencies: z.array(z.string()).default([]).describe("Informational only, never enforced"),
  verification: Verification.optional(),
})

export const TweakSection = z.object({
  name: z.string().min(1),
  icon: z.string().default("🔧"),
  tweaks: z.array(TweakEntry).default([]),
})

export const TweakCatalog = z.object({
  distro: z.string().default(""),
  compatible_versions: z.array(z.coerce.string()).default([]),
  sections: z.array(TweakSection).default([]),
})

export const Timeouts = z.object({
  cache: z.number().positive().default(300),
  install: z.number().positive().default(1800),
  upgrade: z.number().positive().default(3600),
  tweak: z.number().positive().default(300),
})

export const Settings = z.object({
  catalog: z.string().optional().describe("Directory holding apps/ and tweaks/ catalogs"),
  package_manager: z.string().optional().describe("Override the detected package manager"),
  flatpak_remote: z.string().default("flathub"),
  timeouts: Timeouts.default({}),
})

export type InstallMethod = z.infer<typeof InstallMethod>
export type AppEntry = z.infer<typeof AppEntry>
export type AppCategory = z.infer<typeof AppCategory>
export type AppCatalog = z.infer<typeof AppCatalog>
export type TweakStep = z.infer<typeof TweakStep>
export type Verification = z.infer<typeof Verification>
export type TweakEntry = z.infer<typeof TweakEntry>
export type TweakSection = z.infer<typeof TweakSection>
export type TweakCatalog = z.infer<typeof TweakCatalog>
export type Timeouts = z.infer<typeof Timeouts>
export type Settings = z.infer<typeof Settings>
