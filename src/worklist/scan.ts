import { Priority } from '../core/types.js'
import type { TaskMention, WorklistUpdates } from './types.js'

const ID = '[A-Z][A-Z0-9]*-\\d+'
const ID_LIST = `${ID}(?:\\s*,\\s*${ID})*`

const CHECKED_ITEM = new RegExp(`^\\s*[-*]\\s+\\[[xX]\\]\\s+(${ID})\\b`)
const STARTED_ITEM = new RegExp(`^\\s*[-*]\\s+\\[~\\]\\s+(${ID})\\b`)
const OPEN_ITEM = /^\s*[-*]\s+\[ \]\s+(.+)$/
const COMPLETION_WORDS = [
    'done',
    'close', 'closes', 'closed',
    'complete', 'completes', 'completed',
    'fix', 'fixes', 'fixed',
    'resolve', 'resolves', 'resolved',
]
const START_WORDS = ['started', 'starting', 'wip', 'working on']

// verbs match in any case, ids only in upper case ("fixes utf-8" names no task)
function caseless(words: readonly string[]): string {
    return words.map((w) => w.replace(/[a-z]/g, (c) => `[${c}${c.toUpperCase()}]`)).join('|')
}

const COMPLETION_VERB = new RegExp(`\\b(?:${caseless(COMPLETION_WORDS)})\\b[:\\s]+(${ID_LIST})`, 'g')
const START_VERB = new RegExp(`\\b(?:${caseless(START_WORDS)})\\b[:\\s]+(${ID_LIST})`, 'g')
const TODO_LINE = /^\s*(?:[-*]\s+)?(?:TODO|FIXME)\b:?\s*(.+)$/
const LEADING_ID = new RegExp(`^${ID}\\b`)

const P_LEVELS: Record<string, Priority> = { '0': 'critical', '1': 'high', '2': 'medium', '3': 'low' }

function splitIds(list: string): string[] {
    return list.split(',').map((id) => id.trim().toUpperCase()).filter(Boolean)
}

/**
 * Reads a priority marker out of free text: `(high)`, `[critical]`, `P0`-`P3`
 * or `urgent`. Returns the text with the markers removed.
 */
export function parseTaskText(text: string): TaskMention {
    let priority: Priority | undefined
    let description = text

    const named = /[([](critical|high|medium|low)[)\]]/i.exec(description)
    if (named?.[1]) {
        const name = named[1].toLowerCase()
        priority = Priority.find((p) => p === name)
        description = description.replace(named[0], ' ')
    }

    const level = /\bP([0-3])\b/.exec(description)
    if (level?.[1]) {
        priority ??= P_LEVELS[level[1]]
        description = description.replace(level[0], ' ')
    }

    if (/\burgent\b/i.test(description)) priority ??= 'critical'

    description = description.replace(/\s+/g, ' ').trim()
    return priority ? { description, priority } : { description }
}

function unique(values: string[]): string[] {
    return [...new Set(values)]
}

export function scanWorkUpdates(text: string): WorklistUpdates {
    const completed: string[] = []
    const started: string[] = []
    const mentioned: TaskMention[] = []

    for (const line of text.split(/\r?\n/)) {
        const checked = CHECKED_ITEM.exec(line)
        if (checked?.[1]) {
            completed.push(checked[1])
            continue
        }
        const inProgress = STARTED_ITEM.exec(line)
        if (inProgress?.[1]) {
            started.push(inProgress[1])
            continue
        }

        for (const match of line.matchAll(COMPLETION_VERB)) completed.push(...splitIds(match[1] ?? ''))
        for (const match of line.matchAll(START_VERB)) started.push(...splitIds(match[1] ?? ''))

        const task = TODO_LINE.exec(line)?.[1] ?? OPEN_ITEM.exec(line)?.[1]
        if (task && !LEADING_ID.test(task.trim())) {
            const mention = parseTaskText(task)
            if (mention.description) mentioned.push(mention)
        }
    }

    return { completed: unique(completed), started: unique(started), mentioned }
}

export function combineUpdates(...updates: WorklistUpdates[]): WorklistUpdates {
    return {
        completed: unique(updates.flatMap((u) => u.completed)),
        started: unique(updates.flatMap((u) => u.started)),
        mentioned: updates.flatMap((u) => u.mentioned),
    }
}
