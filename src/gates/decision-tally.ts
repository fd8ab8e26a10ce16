import type { TypedEventEmitter } from '../core/events.js'
import type { GateDecision, OperationKind } from '../core/types.js'

interface KindTally {
    allowed: number
    blocked: number
    advisories: number
}

export class DecisionTally {
    private kinds = new Map<OperationKind, KindTally>()
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        const onDecision = ({ kind, decision }: { kind: OperationKind; decision: GateDecision }) => {
            const tally = this.kinds.get(kind) ?? { allowed: 0, blocked: 0, advisories: 0 }
            if (decision.allowed) tally.allowed++
            else tally.blocked++
            tally.advisories += decision.advisories.length
            this.kinds.set(kind, tally)
        }
        eventBus.on('gate:decision', onDecision)
        this.cleanups.push(() => eventBus.off('gate:decision', onDecision))
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    totals(): KindTally {
        const total: KindTally = { allowed: 0, blocked: 0, advisories: 0 }
        for (const t of this.kinds.values()) {
            total.allowed += t.allowed
            total.blocked += t.blocked
            total.advisories += t.advisories
        }
        return total
    }

    formatStatus(): string {
        const t = this.totals()
        return `${t.allowed} allowed, ${t.blocked} blocked, ${t.advisories} advisor${t.advisories === 1 ? 'y' : 'ies'}`
    }
}
