export type OperationKind = 'file_write' | 'file_edit' | 'shell_command'

export const OPERATION_KINDS: readonly OperationKind[] = ['file_write', 'file_edit', 'shell_command']

export interface ToolInvocation {
    kind: OperationKind
    target: string
    requestedAt: Date
}

export interface GateDecision {
    allowed: boolean
    reason?: string
    /** Id of the rule that decided the outcome, e.g. `dangerous-commands#4`. */
    matchedRule?: string
    /** Non-blocking caution messages attached to an allowed operation. */
    advisories: string[]
}

export const Priority = ['critical', 'high', 'medium', 'low'] as const
export type Priority = (typeof Priority)[number]

export const WorkStatus = ['pending', 'in_progress', 'completed'] as const
export type WorkStatus = (typeof WorkStatus)[number]

export interface WorkItem {
    id: string
    description: string
    priority: Priority
    status: WorkStatus
}

export interface FileChange {
    path: string
    linesAdded: number
    linesRemoved: number
}

export interface CommitRecord {
    hash: string
    message: string
    authoredAt: string
    filesChanged: FileChange[]
}
