import type { ResolvedConfig } from '../config/schema.js'
import { errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import type { GateDecision, ToolInvocation } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { loadPolicy } from '../policy/loader.js'
import type { Policy } from '../policy/types.js'
import { CommandGate } from './command-gate.js'
import { type FileGateOptions, FileMutationGate } from './file-gate.js'

/** The single capability a host runtime calls before performing an operation. */
export interface GateCapability {
    evaluate(invocation: ToolInvocation): GateDecision
}

interface GuardOptions extends FileGateOptions {
    projectRoot: string
    logger: Logger
    eventBus?: TypedEventEmitter
}

export class Guard implements GateCapability {
    private fileGate: FileMutationGate
    private commandGate: CommandGate

    constructor(
        readonly policy: Policy,
        private options: GuardOptions
    ) {
        this.fileGate = new FileMutationGate(policy.protectedFiles, options)
        this.commandGate = new CommandGate(policy.dangerousCommands, policy.cautionCommands)
    }

    evaluate(invocation: ToolInvocation): GateDecision {
        const decision = this.decide(invocation)
        const { logger, eventBus } = this.options
        const fields = { kind: invocation.kind, target: invocation.target, rule: decision.matchedRule }

        if (!decision.allowed) {
            logger.info({ ...fields, reason: decision.reason }, 'gate:blocked')
        } else if (decision.advisories.length > 0) {
            for (const advisory of decision.advisories) logger.info({ ...fields, advisory }, 'gate:advisory')
        } else {
            logger.debug(fields, 'gate:allowed')
        }

        eventBus?.emit('gate:decision', { kind: invocation.kind, target: invocation.target, decision })
        return decision
    }

    private decide(invocation: ToolInvocation): GateDecision {
        try {
            switch (invocation.kind) {
                case 'file_write':
                case 'file_edit':
                    return this.fileGate.evaluate(invocation.target, this.options.projectRoot)
                case 'shell_command':
                    return this.commandGate.evaluate(invocation.target)
            }
        } catch (error) {
            return { allowed: false, reason: `gate failure: ${errorMessage(error)}`, advisories: [] }
        }
    }
}

/**
 * Stands in for a Guard whose rules could not be loaded. Every file mutation
 * and every non-empty command is refused with the configuration error.
 */
export class LockdownGuard implements GateCapability {
    constructor(
        readonly cause: Error,
        private logger: Logger,
        private eventBus?: TypedEventEmitter
    ) {}

    evaluate(invocation: ToolInvocation): GateDecision {
        const decision: GateDecision =
            invocation.kind === 'shell_command' && invocation.target.trim() === ''
                ? { allowed: true, advisories: [] }
                : { allowed: false, reason: `policy unavailable: ${this.cause.message}`, advisories: [] }

        this.logger.error({ kind: invocation.kind, target: invocation.target, error: this.cause.message }, 'gate:lockdown')
        this.eventBus?.emit('gate:decision', { kind: invocation.kind, target: invocation.target, decision })
        return decision
    }
}

export async function createGuard(
    config: Pick<ResolvedConfig, 'projectDir' | 'rules' | 'extraRules'>,
    fs: FileSystem,
    logger: Logger,
    eventBus?: TypedEventEmitter
): Promise<GateCapability> {
    try {
        const policy = await loadPolicy(config, fs)
        return new Guard(policy, { projectRoot: config.projectDir, logger, eventBus })
    } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error))
        logger.error({ error: cause.message }, 'policy:load-failed')
        return new LockdownGuard(cause, logger, eventBus)
    }
}
