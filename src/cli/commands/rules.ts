import type { Container } from '../../core/container.js'
import { errorMessage } from '../../core/errors.js'
import { loadPolicy } from '../../policy/loader.js'
import type { RuleSet } from '../../policy/types.js'
import { colors, formatError } from '../ui.js'
import { bootstrap, type GlobalOptions } from './shared.js'

function formatRuleSet(ruleSet: RuleSet): string[] {
    const lines = [colors.bold(`${ruleSet.name} (${ruleSet.severity}, ${ruleSet.rules.length} rules)`)]
    for (const rule of ruleSet.rules) {
        const kind = rule.pattern.kind === 'regex' ? colors.dim('regex') : colors.dim('text ')
        lines.push(`  ${rule.id.padEnd(24)} ${kind}  ${rule.source}`)
    }
    return lines
}

function reportLockdown(error: unknown): number {
    console.error(formatError(errorMessage(error)))
    console.error(colors.warn('Gates run in lockdown until this is fixed: every file write and command is refused.'))
    return 1
}

export async function rulesCommand(options: GlobalOptions): Promise<number> {
    let container: Container
    try {
        container = await bootstrap(options)
    } catch (error) {
        return reportLockdown(error)
    }

    try {
        const policy = await loadPolicy(container.config, container.fs)
        for (const ruleSet of [policy.protectedFiles, policy.dangerousCommands, policy.cautionCommands]) {
            console.log(formatRuleSet(ruleSet).join('\n'))
            console.log('')
        }
        return 0
    } catch (error) {
        return reportLockdown(error)
    } finally {
        container.shutdown()
    }
}
