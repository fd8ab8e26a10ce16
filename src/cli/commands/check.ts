import { OPERATION_KINDS, type OperationKind } from '../../core/types.js'
import { DecisionTally } from '../../gates/decision-tally.js'
import { colors, formatDecision, formatError } from '../ui.js'
import { bootstrap, type GlobalOptions } from './shared.js'

function isOperationKind(value: string): value is OperationKind {
    return OPERATION_KINDS.some((k) => k === value)
}

/** Operator-facing dry run of the gates. Exits 2 when anything would be blocked. */
export async function checkCommand(kind: string, targets: string[], options: GlobalOptions): Promise<number> {
    if (!isOperationKind(kind)) {
        console.error(formatError(`kind must be one of ${OPERATION_KINDS.join(', ')}`))
        return 1
    }

    const container = await bootstrap(options)
    const tally = new DecisionTally(container.eventBus)
    try {
        const guard = await container.createGuard()
        for (const target of targets) {
            const decision = guard.evaluate({ kind, target, requestedAt: new Date() })
            console.log(formatDecision(target, decision))
        }
        console.log(colors.dim(tally.formatStatus()))
        return tally.totals().blocked > 0 ? 2 : 0
    } finally {
        tally.dispose()
        container.shutdown()
    }
}
