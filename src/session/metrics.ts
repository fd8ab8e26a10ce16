import { Priority, type FileChange, type WorkItem } from '../core/types.js'
import { countItems } from '../worklist/format.js'
import type { WorklistCounts } from '../worklist/types.js'
import type { ClassifiedCommit, CommitCategory } from './classifier.js'

export interface EffortEstimate {
    open: number
    hours: number
}

export interface SessionMetrics {
    durationMs: number
    commitCount: number
    filesChanged: number
    linesAdded: number
    linesRemoved: number
    netLines: number
    categoryCounts: Record<CommitCategory, number>
    /** Per-file totals across all commits, in first-seen order. */
    fileTotals: FileChange[]
    uncommittedChanges: number
    tasks: WorklistCounts & { completionRate: number }
    remainingEffort: Record<Priority, EffortEstimate>
    remainingHours: number
}

interface MetricsInput {
    durationMs: number
    commits: readonly ClassifiedCommit[]
    uncommittedChanges: number
    items: readonly WorkItem[]
    effortHours: Record<Priority, number>
}

export function aggregateFiles(commits: readonly ClassifiedCommit[]): FileChange[] {
    const totals = new Map<string, FileChange>()
    for (const commit of commits) {
        for (const change of commit.filesChanged) {
            const entry = totals.get(change.path) ?? { path: change.path, linesAdded: 0, linesRemoved: 0 }
            entry.linesAdded += change.linesAdded
            entry.linesRemoved += change.linesRemoved
            totals.set(change.path, entry)
        }
    }
    return [...totals.values()]
}

export function computeMetrics(input: MetricsInput): SessionMetrics {
    const fileTotals = aggregateFiles(input.commits)
    const linesAdded = fileTotals.reduce((sum, f) => sum + f.linesAdded, 0)
    const linesRemoved = fileTotals.reduce((sum, f) => sum + f.linesRemoved, 0)

    const categoryCounts: Record<CommitCategory, number> = {
        SECURITY: 0,
        FIX: 0,
        FEATURE: 0,
        DOCS: 0,
        REFACTOR: 0,
        OTHER: 0,
    }
    for (const commit of input.commits) categoryCounts[commit.category]++

    const counts = countItems(input.items)
    const completionRate = counts.total === 0 ? 0 : Math.round((counts.completed / counts.total) * 1000) / 10

    const estimate = (priority: Priority): EffortEstimate => {
        const open = input.items.filter((i) => i.priority === priority && i.status !== 'completed').length
        return { open, hours: open * input.effortHours[priority] }
    }
    const remainingEffort: Record<Priority, EffortEstimate> = {
        critical: estimate('critical'),
        high: estimate('high'),
        medium: estimate('medium'),
        low: estimate('low'),
    }
    const remainingHours = Priority.reduce((sum, p) => sum + remainingEffort[p].hours, 0)

    return {
        durationMs: input.durationMs,
        commitCount: input.commits.length,
        filesChanged: fileTotals.length,
        linesAdded,
        linesRemoved,
        netLines: linesAdded - linesRemoved,
        categoryCounts,
        fileTotals,
        uncommittedChanges: input.uncommittedChanges,
        tasks: { ...counts, completionRate },
        remainingEffort,
        remainingHours,
    }
}
