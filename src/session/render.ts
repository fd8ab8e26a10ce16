import { Priority, type WorkItem } from '../core/types.js'
import { renderWorklist } from '../worklist/format.js'
import { COMMIT_CATEGORIES, groupByCategory } from './classifier.js'
import type { SessionRecord } from './types.js'

export const NO_COMMITS = 'No commits this session.'
export const REPOSITORY_UNAVAILABLE = 'Repository data unavailable'

const RECOMMENDATION_LIMIT = 5

export function formatDuration(ms: number): string {
    const totalMinutes = Math.max(0, Math.floor(ms / 60000))
    const hours = Math.floor(totalMinutes / 60)
    const minutes = totalMinutes % 60
    return `${hours}h ${String(minutes).padStart(2, '0')}m`
}

export function shortHash(hash: string): string {
    return hash.slice(0, 7)
}

function lineDelta(added: number, removed: number): string {
    return `(+${added} -${removed})`
}

function bulletList(lines: string[], empty: string): string[] {
    return lines.length > 0 ? lines.map((l) => `- ${l}`) : [empty]
}

function itemLine(item: WorkItem): string {
    return `${item.id} (${item.priority}): ${item.description}`
}

function accomplishments(record: SessionRecord): string[] {
    const done = record.items.filter((i) => record.merge.completed.includes(i.id)).map((i) => `Completed ${i.id}: ${i.description}`)
    const commits = record.commits
        .filter((c) => c.category === 'FEATURE' || c.category === 'FIX' || c.category === 'SECURITY')
        .map((c) => `${c.category}: ${c.message}`)
    return [...done, ...commits]
}

function recommendations(record: SessionRecord): string[] {
    const recs: string[] = []
    if (!record.repositoryAvailable) recs.push('Check that the project is a git repository and git is installed.')
    if (record.uncommitted.length > 0) {
        recs.push(`Commit or stash the ${record.uncommitted.length} uncommitted change(s).`)
    }
    if (record.merge.unknownIds.length > 0) {
        recs.push(`Unknown task ids were referenced: ${record.merge.unknownIds.join(', ')}.`)
    }

    const rank = (item: WorkItem) => Priority.indexOf(item.priority)
    const inProgress = record.items.filter((i) => i.status === 'in_progress').sort((a, b) => rank(a) - rank(b))
    const pending = record.items.filter((i) => i.status === 'pending').sort((a, b) => rank(a) - rank(b))
    const next = [
        ...inProgress.map((i) => `Continue ${itemLine(i)}`),
        ...pending.map((i) => `Start ${itemLine(i)}`),
    ].slice(0, RECOMMENDATION_LIMIT)

    recs.push(...next)
    if (recs.length === 0) recs.push('Worklist is clear.')
    return recs
}

export function renderSummary(record: SessionRecord): string {
    const { metrics } = record
    const lines: string[] = [`# Session Summary: ${record.date}`, '', '## Session', '']
    lines.push(
        `- Started: ${record.windowStart.toISOString()}`,
        `- Ended: ${record.now.toISOString()}`,
        `- Duration: ${formatDuration(metrics.durationMs)}`,
        `- Branch: ${record.branch}`,
        `- Repository: ${record.repositoryAvailable ? 'available' : REPOSITORY_UNAVAILABLE}`
    )

    lines.push('', '## Uncommitted Changes', '')
    if (record.uncommitted.length > 0) {
        lines.push(
            `WARNING: ${record.uncommitted.length} uncommitted change(s) in the working tree. Commit or stash them before ending the session.`,
            ''
        )
        lines.push(...record.uncommitted.map((c) => `- ${c.changeKind}: ${c.path}`))
    } else {
        lines.push(record.repositoryAvailable ? 'None.' : REPOSITORY_UNAVAILABLE)
    }

    const completed = record.items.filter((i) => record.merge.completed.includes(i.id))
    const inProgress = record.items.filter((i) => i.status === 'in_progress')
    lines.push('', '## Tasks Completed', '', ...bulletList(completed.map(itemLine), 'None this session.'))
    lines.push('', '## Tasks In Progress', '', ...bulletList(inProgress.map(itemLine), 'None.'))
    lines.push('', '## New Tasks', '', ...bulletList(record.merge.added.map(itemLine), 'None.'))

    lines.push(
        '',
        '## Files Changed',
        '',
        ...bulletList(
            metrics.fileTotals.map((f) => `${f.path} ${lineDelta(f.linesAdded, f.linesRemoved)}`),
            'None.'
        )
    )

    const commitLines = record.commits.map((c) => `${shortHash(c.hash)} [${c.category}] ${c.message}`)
    lines.push('', '## Commits', '')
    if (!record.repositoryAvailable) lines.push(`${REPOSITORY_UNAVAILABLE}. ${NO_COMMITS}`)
    else lines.push(...bulletList(commitLines, NO_COMMITS))

    lines.push('', '## Key Accomplishments', '', ...bulletList(accomplishments(record), 'None recorded.'))
    lines.push('', '## Next Session', '', ...recommendations(record).map((r) => `- ${r}`))

    return `${lines.join('\n')}\n`
}

export function renderWorklistSnapshot(record: SessionRecord): string {
    return renderWorklist({
        title: `Worklist Snapshot: ${record.date}`,
        updatedAt: record.now.toISOString(),
        items: record.items,
    })
}

export function renderChangelog(record: SessionRecord): string {
    const lines: string[] = [`# Changelog: ${record.date}`, '']
    if (record.commits.length === 0) {
        lines.push(record.repositoryAvailable ? NO_COMMITS : `${REPOSITORY_UNAVAILABLE}. ${NO_COMMITS}`, '')
    }

    for (const [category, commits] of groupByCategory(record.commits)) {
        lines.push(`## ${category}`, '')
        if (commits.length === 0) {
            lines.push('None.', '')
            continue
        }
        for (const commit of commits) {
            lines.push(`### ${shortHash(commit.hash)} ${commit.message}`, '')
            lines.push(`Date: ${commit.authoredAt}`, '')
            lines.push(
                ...bulletList(
                    commit.filesChanged.map((f) => `${f.path} ${lineDelta(f.linesAdded, f.linesRemoved)}`),
                    'No file changes.'
                ),
                ''
            )
        }
    }

    return `${lines.join('\n').trimEnd()}\n`
}

export function renderMetrics(record: SessionRecord): string {
    const m = record.metrics
    const lines = [
        `SESSION METRICS ${record.date}`,
        '',
        `duration: ${formatDuration(m.durationMs)}`,
        `repository: ${record.repositoryAvailable ? 'available' : 'unavailable'}`,
        `commits: ${m.commitCount}`,
        `files_changed: ${m.filesChanged}`,
        `lines_added: ${m.linesAdded}`,
        `lines_removed: ${m.linesRemoved}`,
        `net_lines: ${m.netLines}`,
        `uncommitted_changes: ${m.uncommittedChanges}`,
        '',
        ...COMMIT_CATEGORIES.map((c) => `commits_${c.toLowerCase()}: ${m.categoryCounts[c]}`),
        '',
        `tasks_total: ${m.tasks.total}`,
        `tasks_completed: ${m.tasks.completed}`,
        `tasks_in_progress: ${m.tasks.inProgress}`,
        `tasks_pending: ${m.tasks.pending}`,
        `completion_rate: ${m.tasks.completionRate.toFixed(1)}%`,
        '',
        ...Priority.map((p) => `effort_${p}: ${m.remainingEffort[p].open} open, ${m.remainingEffort[p].hours}h`),
        `effort_total: ${m.remainingHours}h`,
    ]
    return `${lines.join('\n')}\n`
}
