import { loadConfig } from '../../config/loader.js'
import type { ResolvedConfig } from '../../config/schema.js'
import { createContainer } from '../../core/container.js'
import { errorMessage } from '../../core/errors.js'
import { NodeFileSystem } from '../../core/fs.js'
import type { GateDecision, ToolInvocation } from '../../core/types.js'
import { type GateCapability, LockdownGuard } from '../../gates/guard.js'
import type { HookRunner } from '../../hooks/runner.js'
import { EXIT_ALLOWED, EXIT_REFUSED, type HookReply, parseHookPayload, toHookReply } from '../../hooks/payload.js'
import { createLogger } from '../../logger/index.js'
import { startSession } from '../../session/marker.js'
import type { GlobalOptions } from './shared.js'

export interface HookOutcome {
    reply: HookReply
    exitCode: number
    invocation?: ToolInvocation
    decision?: GateDecision
}

/** Evaluates one hook payload. Malformed input is refused, never allowed. */
export function evaluateHookInput(input: string, guard: GateCapability, now: Date): HookOutcome {
    const parsed = parseHookPayload(input, now)
    if (!parsed.ok) {
        return { reply: { allowed: false, message: `Blocked: ${parsed.error}` }, exitCode: EXIT_REFUSED }
    }
    const decision = guard.evaluate(parsed.value)
    return {
        reply: toHookReply(decision),
        exitCode: decision.allowed ? EXIT_ALLOWED : EXIT_REFUSED,
        invocation: parsed.value,
        decision,
    }
}

export async function notifyBlocked(hookRunner: HookRunner, outcome: HookOutcome): Promise<void> {
    if (outcome.reply.allowed || !outcome.invocation) return
    await hookRunner.run('GateBlocked', {
        WARDEN_KIND: outcome.invocation.kind,
        WARDEN_TARGET: outcome.invocation.target,
        WARDEN_REASON: outcome.decision?.reason ?? outcome.reply.message,
    })
}

async function readAllStdin(): Promise<string> {
    const chunks: Buffer[] = []
    for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
    return Buffer.concat(chunks).toString('utf8').trim()
}

/**
 * Host boundary: one JSON request on stdin, one JSON reply on stdout.
 * Nothing else may be written to stdout; logs go to stderr.
 */
export async function hookCommand(options: GlobalOptions): Promise<number> {
    const input = await readAllStdin()
    const now = new Date()
    const fs = new NodeFileSystem()

    let config: ResolvedConfig
    try {
        config = await loadConfig({ fs, projectDir: options.project ?? process.cwd() })
    } catch (error) {
        const cause = error instanceof Error ? error : new Error(errorMessage(error))
        const guard = new LockdownGuard(cause, createLogger({ logLevel: 'error' }))
        const outcome = evaluateHookInput(input, guard, now)
        process.stdout.write(`${JSON.stringify(outcome.reply)}\n`)
        return outcome.exitCode
    }

    const container = createContainer(options.debug ? { ...config, logLevel: 'debug' } : config, { fs })
    try {
        const guard = await container.createGuard()
        const outcome = evaluateHookInput(input, guard, now)
        process.stdout.write(`${JSON.stringify(outcome.reply)}\n`)

        try {
            const { created, startedAt } = await startSession(fs, config.projectDir, now)
            if (created) container.logger.info({ startedAt: startedAt.toISOString() }, 'session:opened')
        } catch (error) {
            container.logger.warn({ error: errorMessage(error) }, 'session:marker-failed')
        }

        await notifyBlocked(container.hookRunner, outcome)
        return outcome.exitCode
    } finally {
        container.shutdown()
    }
}
