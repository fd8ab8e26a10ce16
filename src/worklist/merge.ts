import type { WorkItem } from '../core/types.js'
import { nextId } from './format.js'
import type { WorklistUpdates } from './types.js'

export interface MergeResult {
    items: WorkItem[]
    /** Ids that moved to completed during this merge. */
    completed: string[]
    /** Ids that moved from pending to in progress during this merge. */
    started: string[]
    added: WorkItem[]
    /** Ids referenced by the updates that the worklist does not contain. */
    unknownIds: string[]
}

export function normalizeDescription(description: string): string {
    return description
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .replace(/[.!;:,\s]+$/, '')
        .trim()
}

/**
 * Folds session updates into the worklist. Items are never removed;
 * completed items are never reopened; a task mention whose description is
 * already on the list is ignored, so applying the same updates twice
 * changes nothing the second time.
 */
export function mergeWorklist(current: readonly WorkItem[], updates: WorklistUpdates): MergeResult {
    const items = current.map((item) => ({ ...item }))
    const byId = new Map(items.map((item) => [item.id, item]))
    const result: MergeResult = { items, completed: [], started: [], added: [], unknownIds: [] }
    const unknown = new Set<string>()

    for (const id of updates.completed) {
        const item = byId.get(id)
        if (!item) {
            unknown.add(id)
            continue
        }
        if (item.status !== 'completed') {
            item.status = 'completed'
            result.completed.push(id)
        }
    }

    for (const id of updates.started) {
        const item = byId.get(id)
        if (!item) {
            unknown.add(id)
            continue
        }
        if (item.status === 'pending') {
            item.status = 'in_progress'
            result.started.push(id)
        }
    }

    const known = new Set(items.map((item) => normalizeDescription(item.description)))
    for (const mention of updates.mentioned) {
        const key = normalizeDescription(mention.description)
        if (!key || known.has(key)) continue
        known.add(key)

        const item: WorkItem = {
            id: nextId(items),
            description: mention.description,
            priority: mention.priority ?? 'medium',
            status: 'pending',
        }
        items.push(item)
        result.added.push(item)
    }

    result.unknownIds = [...unknown]
    return result
}
