import { z } from 'zod'
import type { Priority } from '../core/types.js'

export const HookConfigSchema = z.object({
    command: z.string().min(1),
    timeout: z.number().positive().optional(),
})

export const RuleListsSchema = z
    .object({
        protectedFiles: z.array(z.string()).optional(),
        dangerousCommands: z.array(z.string()).optional(),
        cautionCommands: z.array(z.string()).optional(),
    })
    .strict()

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const ConfigSchema = z
    .object({
        logLevel: LogLevelSchema.optional(),
        gitTimeoutMs: z.number().int().positive().optional(),
        archiveDir: z.string().min(1).optional(),
        worklistFile: z.string().min(1).optional(),
        notesFile: z.string().min(1).optional(),
        rules: RuleListsSchema.optional(),
        extraRules: RuleListsSchema.optional(),
        effortHours: z
            .object({
                critical: z.number().nonnegative().optional(),
                high: z.number().nonnegative().optional(),
                medium: z.number().nonnegative().optional(),
                low: z.number().nonnegative().optional(),
            })
            .optional(),
        hooks: z
            .object({
                GateBlocked: z.array(HookConfigSchema).optional(),
                SessionEnd: z.array(HookConfigSchema).optional(),
            })
            .optional(),
    })
    .strict()

export type Config = z.infer<typeof ConfigSchema>
export type RuleLists = z.infer<typeof RuleListsSchema>
export type LogLevel = z.infer<typeof LogLevelSchema>

export interface ResolvedConfig {
    logLevel: LogLevel
    gitTimeoutMs: number
    /** Absolute paths, resolved against projectDir. */
    archiveDir: string
    worklistFile: string
    notesFile: string
    /** Lists given here replace the built-in defaults for that category. */
    rules: RuleLists
    /** Lists given here are appended to whatever `rules` resolved to. */
    extraRules: RuleLists
    effortHours: Record<Priority, number>
    hooks: NonNullable<Config['hooks']>
    projectDir: string
    configDir: string
}
