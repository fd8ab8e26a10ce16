import { describe, it, expect, vi } from 'vitest'
import pino from 'pino'
import { HookRunner } from '../../src/hooks/runner.js'
import type { ResolvedConfig } from '../../src/config/schema.js'
import { silentLogger } from '../helpers/logger.js'

function runner(hooks: ResolvedConfig['hooks'], logger = silentLogger) {
    return new HookRunner({ hooks, projectDir: process.cwd() }, logger)
}

describe('HookRunner', () => {
    it('returns nothing when no hooks are configured', async () => {
        expect(await runner({}).run('SessionEnd')).toEqual([])
    })

    it('GateBlocked hooks receive the refused invocation', async () => {
        const results = await runner({
            GateBlocked: [{ command: 'echo "$WARDEN_KIND|$WARDEN_TARGET|$WARDEN_REASON"', timeout: 5000 }],
        }).run('GateBlocked', {
            WARDEN_KIND: 'shell_command',
            WARDEN_TARGET: 'git push -f',
            WARDEN_REASON: 'dangerous command',
        })

        expect(results).toEqual([
            { hookName: 'GateBlocked', success: true, output: 'shell_command|git push -f|dangerous command' },
        ])
    })

    it('runs SessionEnd hooks in order', async () => {
        const results = await runner({
            SessionEnd: [{ command: 'echo first' }, { command: 'echo "$WARDEN_SESSION_DATE"' }],
        }).run('SessionEnd', { WARDEN_SESSION_DATE: '2026-03-02' })

        expect(results.map((r) => r.output)).toEqual(['first', '2026-03-02'])
    })

    it('reports a failing hook without throwing', async () => {
        const logger = pino({ level: 'silent' })
        const warn = vi.spyOn(logger, 'warn')
        const results = await runner({ SessionEnd: [{ command: 'echo broken >&2; exit 3' }] }, logger).run('SessionEnd')

        expect(results).toEqual([{ hookName: 'SessionEnd', success: false, output: '', error: 'exit code 3: broken' }])
        expect(warn).toHaveBeenCalledTimes(1)
    })

    it('stops a hook that runs past its timeout', async () => {
        const results = await runner({ SessionEnd: [{ command: 'sleep 5', timeout: 200 }] }).run('SessionEnd')
        expect(results[0]?.success).toBe(false)
        expect(results[0]?.error).toBe('timed out')
    })
})
