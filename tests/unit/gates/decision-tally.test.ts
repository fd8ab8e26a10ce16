import { describe, it, expect } from 'vitest'
import { DecisionTally } from '../../../src/gates/decision-tally.js'
import { TypedEventEmitter } from '../../../src/core/events.js'

function emit(bus: TypedEventEmitter, kind: 'file_write' | 'shell_command', allowed: boolean, advisories: string[] = []) {
    bus.emit('gate:decision', { kind, target: 'x', decision: { allowed, advisories } })
}

describe('DecisionTally', () => {
    it('counts decisions across kinds', () => {
        const bus = new TypedEventEmitter()
        const tally = new DecisionTally(bus)
        emit(bus, 'file_write', true)
        emit(bus, 'shell_command', false)
        emit(bus, 'shell_command', true, ['a', 'b'])

        expect(tally.totals()).toEqual({ allowed: 2, blocked: 1, advisories: 2 })
        expect(tally.formatStatus()).toBe('2 allowed, 1 blocked, 2 advisories')
    })

    it('uses the singular for one advisory', () => {
        const bus = new TypedEventEmitter()
        const tally = new DecisionTally(bus)
        emit(bus, 'shell_command', true, ['a'])
        expect(tally.formatStatus()).toBe('1 allowed, 0 blocked, 1 advisory')
    })

    it('stops counting after dispose', () => {
        const bus = new TypedEventEmitter()
        const tally = new DecisionTally(bus)
        tally.dispose()
        emit(bus, 'file_write', true)
        expect(tally.totals()).toEqual({ allowed: 0, blocked: 0, advisories: 0 })
    })
})
