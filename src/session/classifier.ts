import type { CommitRecord } from '../core/types.js'

export const COMMIT_CATEGORIES = ['SECURITY', 'FIX', 'FEATURE', 'DOCS', 'REFACTOR', 'OTHER'] as const
export type CommitCategory = (typeof COMMIT_CATEGORIES)[number]

export interface ClassifiedCommit extends CommitRecord {
    category: CommitCategory
}

// Checked in order. Prefixes cover conventional-commit types and bracketed
// tags like "[SECURITY]"; the keyword pass is a loose fallback.
const PREFIXES: ReadonlyArray<[CommitCategory, RegExp]> = [
    ['SECURITY', /^(security|sec)\b/i],
    ['FIX', /^(fix|fixes|fixed|bugfix|hotfix)\b/i],
    ['FEATURE', /^(feat|feature)\b/i],
    ['DOCS', /^(docs?|documentation)\b/i],
    ['REFACTOR', /^refactor\w*\b/i],
]

const KEYWORDS: ReadonlyArray<[CommitCategory, RegExp]> = [
    ['SECURITY', /\b(security|vulnerability|CVE-\d{4}-\d+)\b/i],
    ['FIX', /\b(fix(es|ed)?|bug)\b/i],
    ['FEATURE', /\b(feature|implement(s|ed)?|add(s|ed)?)\b/i],
    ['DOCS', /\b(docs?|documentation|readme)\b/i],
    ['REFACTOR', /\b(refactor\w*|clean ?up)\b/i],
]

export function classifyCommit(message: string): CommitCategory {
    const head = message.trim().replace(/^\[/, '')
    for (const [category, pattern] of PREFIXES) {
        if (pattern.test(head)) return category
    }
    for (const [category, pattern] of KEYWORDS) {
        if (pattern.test(head)) return category
    }
    return 'OTHER'
}

export function classifyCommits(commits: readonly CommitRecord[]): ClassifiedCommit[] {
    return commits.map((commit) => ({ ...commit, category: classifyCommit(commit.message) }))
}

/** Every category in fixed order; commits keep their chronological order. */
export function groupByCategory(commits: readonly ClassifiedCommit[]): Map<CommitCategory, ClassifiedCommit[]> {
    const groups = new Map<CommitCategory, ClassifiedCommit[]>(COMMIT_CATEGORIES.map((c) => [c, []]))
    for (const commit of commits) groups.get(commit.category)?.push(commit)
    return groups
}
