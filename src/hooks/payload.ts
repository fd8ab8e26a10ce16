import { z } from 'zod'
import { err, ok, type Result } from '../core/result.js'
import type { GateDecision, OperationKind, ToolInvocation } from '../core/types.js'

// Names some hosts use for their file and shell tools.
const KIND_ALIASES: Record<string, OperationKind> = {
    file_write: 'file_write',
    file_edit: 'file_edit',
    shell_command: 'shell_command',
    write: 'file_write',
    edit: 'file_edit',
    multiedit: 'file_edit',
    bash: 'shell_command',
    shell: 'shell_command',
}

const GatePayloadSchema = z.object({
    operationKind: z.string(),
    target: z.string(),
    metadata: z.record(z.unknown()).optional(),
})

const HostToolPayloadSchema = z.object({
    tool_name: z.string(),
    tool_input: z.object({
        file_path: z.string().optional(),
        command: z.string().optional(),
    }),
})

export interface HookReply {
    allowed: boolean
    message: string
}

function resolveKind(name: string): OperationKind | undefined {
    return KIND_ALIASES[name.toLowerCase()]
}

export function parseHookPayload(input: string, now: Date): Result<ToolInvocation> {
    let raw: unknown
    try {
        raw = JSON.parse(input)
    } catch {
        return err('hook input is not valid JSON')
    }

    const direct = GatePayloadSchema.safeParse(raw)
    if (direct.success) {
        const kind = resolveKind(direct.data.operationKind)
        if (!kind) return err(`unknown operation kind '${direct.data.operationKind}'`)
        return ok({ kind, target: direct.data.target, requestedAt: now })
    }

    const host = HostToolPayloadSchema.safeParse(raw)
    if (host.success) {
        const kind = resolveKind(host.data.tool_name)
        if (!kind) return err(`unknown tool '${host.data.tool_name}'`)
        const target = kind === 'shell_command' ? host.data.tool_input.command : host.data.tool_input.file_path
        if (target === undefined) return err(`tool '${host.data.tool_name}' input has no target`)
        return ok({ kind, target, requestedAt: now })
    }

    return err('hook input must carry operationKind and target')
}

export function toHookReply(decision: GateDecision): HookReply {
    if (!decision.allowed) return { allowed: false, message: `Blocked: ${decision.reason ?? 'policy violation'}` }
    if (decision.advisories.length > 0) return { allowed: true, message: decision.advisories.join('\n') }
    return { allowed: true, message: 'allowed' }
}

export const EXIT_ALLOWED = 0
export const EXIT_REFUSED = 2
