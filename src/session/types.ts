import type { WorkItem } from '../core/types.js'
import type { WorkingTreeChange } from '../repo/types.js'
import type { MergeResult } from '../worklist/merge.js'
import type { WorklistUpdates } from '../worklist/types.js'
import type { ClassifiedCommit, CommitCategory } from './classifier.js'
import type { SessionMetrics } from './metrics.js'

/** Everything a close needs that is not read from the repository or the worklist file. */
export interface SessionContext {
    windowStart: Date
    now: Date
    /** Explicit updates from the operator (command-line flags). */
    updates: WorklistUpdates
    /** Free-form session notes scanned for task updates. */
    notes: string | null
}

export interface SessionRecord {
    date: string
    windowStart: Date
    now: Date
    branch: string
    repositoryAvailable: boolean
    commits: ClassifiedCommit[]
    uncommitted: WorkingTreeChange[]
    items: WorkItem[]
    merge: MergeResult
    metrics: SessionMetrics
}

export const ARTIFACT_NAMES = ['summary', 'worklist', 'changelog', 'metrics'] as const
export type ArtifactName = (typeof ARTIFACT_NAMES)[number]

export const ARTIFACT_FILES: Record<ArtifactName, string> = {
    summary: 'SUMMARY.md',
    worklist: 'WORKLIST.md',
    changelog: 'CHANGELOG.md',
    metrics: 'METRICS.txt',
}

export interface SessionArtifactSet {
    date: string
    directory: string
    summary: string
    worklistSnapshot: WorkItem[]
    changelog: Map<CommitCategory, ClassifiedCommit[]>
    metrics: SessionMetrics
}

export interface ArtifactFailure {
    artifact: ArtifactName | 'archive' | 'worklist'
    error: string
}

export interface CloseSessionReport {
    artifacts: SessionArtifactSet
    /** Paths of the artifact files that were written. */
    written: string[]
    failures: ArtifactFailure[]
    worklistUpdated: boolean
}
