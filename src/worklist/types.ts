import type { Priority, WorkItem } from '../core/types.js'

export interface WorklistCounts {
    total: number
    completed: number
    inProgress: number
    pending: number
}

export interface WorklistDocument {
    title: string
    updatedAt: string | null
    items: WorkItem[]
    /** Counts as written in the Summary section, when the file had one. */
    declaredCounts: WorklistCounts | null
}

export interface TaskMention {
    description: string
    priority?: Priority
}

export interface WorklistUpdates {
    completed: string[]
    started: string[]
    mentioned: TaskMention[]
}
