import type { CommitRecord } from '../core/types.js'
import type { ChangeKind, DiffStat, WorkingTreeChange } from './types.js'

export const RECORD_SEP = '\x1e'
export const FIELD_SEP = '\x1f'

/** `%x1e%H%x1f%aI%x1f%s`: one record per commit, numstat lines follow the header. */
export const LOG_FORMAT = '%x1e%H%x1f%aI%x1f%s'

const KIND_CODES: Record<string, ChangeKind> = {
    M: 'modified',
    A: 'added',
    D: 'deleted',
    R: 'renamed',
    C: 'copied',
    T: 'type_changed',
}

function changeKind(xy: string): ChangeKind | null {
    if (xy === '??') return 'untracked'
    if (xy === '!!') return null
    if (xy.includes('U') || xy === 'DD' || xy === 'AA') return 'conflicted'
    for (const code of xy) {
        const kind = KIND_CODES[code]
        if (kind) return kind
    }
    return null
}

/** Parses `git status --porcelain=v1 -z` output. */
export function parsePorcelainStatus(output: string): WorkingTreeChange[] {
    const entries = output.split('\0')
    const changes: WorkingTreeChange[] = []

    for (let i = 0; i < entries.length; i++) {
        const entry = entries[i]
        if (!entry || entry.length < 4) continue

        const xy = entry.slice(0, 2)
        const filePath = entry.slice(3)
        const kind = changeKind(xy)
        // renames and copies carry their source path as the next entry
        if (xy.includes('R') || xy.includes('C')) i++
        if (kind) changes.push({ path: filePath, changeKind: kind })
    }

    return changes
}

function toCount(value: string): number {
    // binary files report "-"
    const n = Number.parseInt(value, 10)
    return Number.isNaN(n) ? 0 : n
}

const C_ESCAPES: Record<string, number> = { a: 7, b: 8, t: 9, n: 10, v: 11, f: 12, r: 13, '"': 34, '\\': 92 }

/** Undoes git's C-style path quoting: `"caf\303\251.txt"` becomes `café.txt`. */
export function unquotePath(value: string): string {
    if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) return value

    const chars = Array.from(value.slice(1, -1))
    const bytes: number[] = []
    for (let i = 0; i < chars.length; i++) {
        const ch = chars[i] ?? ''
        if (ch !== '\\') {
            bytes.push(...Buffer.from(ch, 'utf8'))
            continue
        }
        const octal = chars.slice(i + 1, i + 4).join('')
        if (/^[0-7]{3}$/.test(octal)) {
            bytes.push(Number.parseInt(octal, 8))
            i += 3
            continue
        }
        const next = chars[i + 1] ?? ''
        bytes.push(C_ESCAPES[next] ?? next.charCodeAt(0))
        i++
    }
    return Buffer.from(bytes).toString('utf8')
}

/** Parses `--numstat` lines: `added<TAB>removed<TAB>path`. */
export function parseNumstat(lines: Iterable<string>): DiffStat[] {
    const stats: DiffStat[] = []
    for (const line of lines) {
        const parts = line.split('\t')
        if (parts.length < 3) continue
        const [added = '', removed = '', ...rest] = parts
        stats.push({ path: unquotePath(rest.join('\t')), linesAdded: toCount(added), linesRemoved: toCount(removed) })
    }
    return stats
}

/** Parses `git log --numstat --format=LOG_FORMAT`. */
export function parseLog(output: string): CommitRecord[] {
    const commits: CommitRecord[] = []

    for (const record of output.split(RECORD_SEP)) {
        if (record.trim() === '') continue
        const [header = '', ...rest] = record.split('\n')
        const [hash = '', authoredAt = '', message = ''] = header.split(FIELD_SEP)
        if (!hash) continue
        commits.push({
            hash,
            authoredAt,
            message,
            filesChanged: parseNumstat(rest.filter((l) => l.trim() !== '')),
        })
    }

    return commits
}
