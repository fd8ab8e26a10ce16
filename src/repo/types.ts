import type { FileChange } from '../core/types.js'

export type ChangeKind =
    | 'added'
    | 'modified'
    | 'deleted'
    | 'renamed'
    | 'copied'
    | 'type_changed'
    | 'untracked'
    | 'conflicted'

export interface WorkingTreeChange {
    path: string
    changeKind: ChangeKind
}

export type DiffStat = FileChange
