import type { GateDecision } from '../core/types.js'
import { matchAll, matches } from '../policy/matcher.js'
import type { RuleSet } from '../policy/types.js'

export class CommandGate {
    constructor(
        private dangerous: RuleSet,
        private caution: RuleSet
    ) {}

    evaluate(command: string | null | undefined): GateDecision {
        if (typeof command !== 'string') {
            return { allowed: false, reason: 'malformed command', advisories: [] }
        }
        if (command.trim() === '') return { allowed: true, advisories: [] }

        // hard-block tier runs to completion before any caution check
        const blocked = matches(command, this.dangerous)
        if (blocked) {
            return {
                allowed: false,
                reason: `dangerous command: matches "${blocked.rule.source}": ${command}`,
                matchedRule: blocked.rule.id,
                advisories: [],
            }
        }

        const cautions = matchAll(command, this.caution)
        if (cautions.length === 0) return { allowed: true, advisories: [] }

        return {
            allowed: true,
            matchedRule: cautions[0]?.rule.id,
            advisories: cautions.map((m) => `caution: matches "${m.rule.source}"`),
        }
    }
}
