import { Priority, type WorkItem, type WorkStatus } from '../core/types.js'
import type { WorklistCounts, WorklistDocument } from './types.js'

export const DEFAULT_TITLE = 'Worklist'
export const ID_PREFIX = 'WL-'
const NEVER_UPDATED = 'never'

const PRIORITY_HEADINGS: Record<Priority, string> = {
    critical: 'Critical',
    high: 'High',
    medium: 'Medium',
    low: 'Low',
}

const MARKERS: Record<WorkStatus, string> = {
    pending: '[ ]',
    in_progress: '[~]',
    completed: '[x]',
}

const ITEM_LINE = /^\s*[-*]\s+\[( |x|X|~)\]\s+(.*)$/
const ITEM_ID = /^([A-Z][A-Z0-9]*-\d+):\s*(.*)$/
const COUNT_LINE = /^\s*[-*]\s+(Total|Completed|In progress|Pending):\s*(\d+)\s*$/i

export function countItems(items: readonly WorkItem[]): WorklistCounts {
    const counts: WorklistCounts = { total: items.length, completed: 0, inProgress: 0, pending: 0 }
    for (const item of items) {
        if (item.status === 'completed') counts.completed++
        else if (item.status === 'in_progress') counts.inProgress++
        else counts.pending++
    }
    return counts
}

export function nextId(items: readonly Pick<WorkItem, 'id'>[]): string {
    let max = 0
    for (const { id } of items) {
        if (!id.startsWith(ID_PREFIX)) continue
        const n = Number.parseInt(id.slice(ID_PREFIX.length), 10)
        if (!Number.isNaN(n) && n > max) max = n
    }
    return `${ID_PREFIX}${String(max + 1).padStart(3, '0')}`
}

function markerStatus(marker: string): WorkStatus {
    if (marker === '~') return 'in_progress'
    if (marker === 'x' || marker === 'X') return 'completed'
    return 'pending'
}

function headingPriority(heading: string): Priority | null {
    const key = heading.trim().toLowerCase()
    return Priority.find((p) => p === key) ?? null
}

const COUNT_KEYS: Record<string, keyof WorklistCounts> = {
    total: 'total',
    completed: 'completed',
    'in progress': 'inProgress',
    pending: 'pending',
}

/**
 * Parses the worklist markdown. Items written without an id get one, and a
 * repeated id is reassigned so ids stay unique within the document.
 */
export function parseWorklist(content: string): WorklistDocument {
    let title = DEFAULT_TITLE
    let updatedAt: string | null = null
    let priority: Priority = 'medium'
    const declared: Partial<WorklistCounts> = {}
    const parsed: Array<{ id: string | null; description: string; priority: Priority; status: WorkStatus }> = []

    for (const line of content.split(/\r?\n/)) {
        if (line.startsWith('# ')) {
            title = line.slice(2).trim() || DEFAULT_TITLE
            continue
        }
        if (line.startsWith('## ')) {
            priority = headingPriority(line.slice(3)) ?? priority
            continue
        }
        const updated = /^Last updated:\s*(.+)$/.exec(line)
        if (updated?.[1]) {
            const value = updated[1].trim()
            updatedAt = value === NEVER_UPDATED ? null : value
            continue
        }
        const count = COUNT_LINE.exec(line)
        if (count?.[1] && count[2]) {
            const key = COUNT_KEYS[count[1].toLowerCase()]
            if (key) declared[key] = Number.parseInt(count[2], 10)
            continue
        }
        const item = ITEM_LINE.exec(line)
        if (!item) continue

        const text = (item[2] ?? '').trim()
        const withId = ITEM_ID.exec(text)
        parsed.push({
            id: withId?.[1] ?? null,
            description: (withId ? withId[2] ?? '' : text).trim(),
            priority,
            status: markerStatus(item[1] ?? ' '),
        })
    }

    const items: WorkItem[] = []
    const seen = new Set<string>()
    for (const entry of parsed) {
        const id = entry.id && !seen.has(entry.id) ? entry.id : nextId([...items, ...pendingIds(parsed)])
        seen.add(id)
        items.push({ id, description: entry.description, priority: entry.priority, status: entry.status })
    }

    const declaredCounts =
        declared.total !== undefined &&
        declared.completed !== undefined &&
        declared.inProgress !== undefined &&
        declared.pending !== undefined
            ? { total: declared.total, completed: declared.completed, inProgress: declared.inProgress, pending: declared.pending }
            : null

    return { title, updatedAt, items, declaredCounts }
}

function pendingIds(parsed: ReadonlyArray<{ id: string | null }>): Array<{ id: string }> {
    return parsed.flatMap((p) => (p.id ? [{ id: p.id }] : []))
}

export function renderWorklist(doc: Pick<WorklistDocument, 'title' | 'updatedAt' | 'items'>): string {
    const counts = countItems(doc.items)
    const lines: string[] = [
        `# ${doc.title}`,
        '',
        `Last updated: ${doc.updatedAt ?? NEVER_UPDATED}`,
        '',
        '## Summary',
        '',
        `- Total: ${counts.total}`,
        `- Completed: ${counts.completed}`,
        `- In progress: ${counts.inProgress}`,
        `- Pending: ${counts.pending}`,
    ]

    for (const priority of Priority) {
        lines.push('', `## ${PRIORITY_HEADINGS[priority]}`, '')
        const section = doc.items.filter((item) => item.priority === priority)
        if (section.length === 0) {
            lines.push('_No items._')
            continue
        }
        for (const item of section) {
            lines.push(`- ${MARKERS[item.status]} ${item.id}: ${item.description}`)
        }
    }

    return `${lines.join('\n')}\n`
}
