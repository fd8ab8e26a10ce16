import { realpathSync } from 'node:fs'
import path from 'node:path'
import { errorCode, errorMessage } from '../core/errors.js'
import type { GateDecision } from '../core/types.js'
import { matches } from '../policy/matcher.js'
import type { RuleSet } from '../policy/types.js'

export const UNRESOLVABLE_PATH = 'unresolvable path'
export const OUTSIDE_PROJECT = 'outside project directory'

export interface FileGateOptions {
    cwd?: () => string
    realpath?: (p: string) => string
}

/**
 * Resolves symlinks along the deepest existing ancestor of `absPath`, then
 * re-appends the segments that do not exist yet. A file about to be created
 * inside a symlinked directory resolves to where it would really land.
 */
export function resolveSymlinks(absPath: string, realpath: (p: string) => string = realpathSync.native): string {
    const missing: string[] = []
    let current = absPath
    for (;;) {
        try {
            return path.join(realpath(current), ...missing)
        } catch (error) {
            const code = errorCode(error)
            if (code !== 'ENOENT' && code !== 'ENOTDIR') throw error
            const parent = path.dirname(current)
            if (parent === current) return absPath
            missing.unshift(path.basename(current))
            current = parent
        }
    }
}

export function isWithin(root: string, candidate: string): boolean {
    const rel = path.relative(root, candidate)
    if (rel === '') return true
    if (path.isAbsolute(rel)) return false
    return rel !== '..' && !rel.startsWith(`..${path.sep}`)
}

export class FileMutationGate {
    private cwd: () => string
    private realpath: (p: string) => string

    constructor(
        private protectedFiles: RuleSet,
        options: FileGateOptions = {}
    ) {
        this.cwd = options.cwd ?? (() => process.cwd())
        this.realpath = options.realpath ?? realpathSync.native
    }

    evaluate(target: string | null | undefined, projectRoot: string): GateDecision {
        if (typeof target !== 'string' || target.trim() === '' || target.includes('\0')) {
            return { allowed: false, reason: UNRESOLVABLE_PATH, advisories: [] }
        }

        let lexical: string
        let resolved: string
        let root: string
        try {
            lexical = path.resolve(this.cwd(), target)
            resolved = resolveSymlinks(lexical, this.realpath)
            root = resolveSymlinks(path.resolve(this.cwd(), projectRoot), this.realpath)
        } catch (error) {
            return { allowed: false, reason: `${UNRESOLVABLE_PATH}: ${errorMessage(error)}`, advisories: [] }
        }

        const hit = matches(lexical, this.protectedFiles) ?? matches(resolved, this.protectedFiles)
        if (hit) {
            return {
                allowed: false,
                reason: `protected path: matches "${hit.rule.source}"`,
                matchedRule: hit.rule.id,
                advisories: [],
            }
        }

        if (!isWithin(root, resolved)) {
            return { allowed: false, reason: OUTSIDE_PROJECT, advisories: [] }
        }

        return { allowed: true, advisories: [] }
    }
}
