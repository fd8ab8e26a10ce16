import path from 'node:path'
import type { CommitRecord } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { type GitRunner, execaGitRunner } from './git-runner.js'
import { LOG_FORMAT, parseLog, parseNumstat, parsePorcelainStatus } from './parse.js'
import type { DiffStat, WorkingTreeChange } from './types.js'

export const DETACHED_HEAD = '(detached)'
export const NO_REPOSITORY = '(no repository)'

const COMMIT_HASH = /^[0-9a-f]{4,64}$/i

interface InspectorOptions {
    cwd: string
    timeoutMs: number
    logger: Logger
    run?: GitRunner
    /**
     * Files and directories left out of uncommittedChanges, absolute or
     * relative to `cwd`. A directory hides everything beneath it.
     */
    ignorePaths?: readonly string[]
}

/**
 * Read-only git queries. Every failure (no repository, git not installed,
 * timeout) is logged and turned into an empty result or a sentinel.
 */
export class RepositoryInspector {
    private run: GitRunner

    constructor(private options: InspectorOptions) {
        this.run = options.run ?? execaGitRunner
    }

    async isAvailable(timeoutMs?: number): Promise<boolean> {
        const out = await this.git(['rev-parse', '--is-inside-work-tree'], timeoutMs)
        return out?.trim() === 'true'
    }

    async currentBranch(timeoutMs?: number): Promise<string> {
        const branch = await this.git(['symbolic-ref', '--short', '-q', 'HEAD'], timeoutMs)
        if (branch && branch.trim()) return branch.trim()
        return (await this.isAvailable(timeoutMs)) ? DETACHED_HEAD : NO_REPOSITORY
    }

    async uncommittedChanges(timeoutMs?: number): Promise<WorkingTreeChange[]> {
        const out = await this.git(['status', '--porcelain=v1', '-z', '--untracked-files=all'], timeoutMs)
        if (!out) return []
        const changes = parsePorcelainStatus(out)
        const ignored = await this.ignoredPaths(timeoutMs)
        if (ignored.length === 0) return changes
        return changes.filter(
            (change) => !ignored.some((p) => change.path === p || change.path.startsWith(`${p}/`))
        )
    }

    async commitsSince(since: Date, timeoutMs?: number): Promise<CommitRecord[]> {
        const out = await this.git(
            [
                'log',
                `--since=${since.toISOString()}`,
                '--reverse',
                '--no-color',
                '--no-renames',
                '--numstat',
                `--format=${LOG_FORMAT}`,
            ],
            timeoutMs
        )
        return out ? parseLog(out) : []
    }

    async diffStats(commitHash: string, timeoutMs?: number): Promise<DiffStat[]> {
        if (!COMMIT_HASH.test(commitHash)) {
            this.options.logger.warn({ commitHash }, 'git:invalid-hash')
            return []
        }
        const out = await this.git(
            ['show', '--numstat', '--format=', '--no-color', '--no-renames', commitHash],
            timeoutMs
        )
        return out ? parseNumstat(out.split('\n')) : []
    }

    // status paths are relative to the repository top level, not to cwd
    private async ignoredPaths(timeoutMs?: number): Promise<string[]> {
        const { cwd, ignorePaths = [] } = this.options
        if (ignorePaths.length === 0) return []
        const prefix = (await this.git(['rev-parse', '--show-prefix'], timeoutMs))?.trim() ?? ''
        return ignorePaths.map((p) => {
            const relative = path.relative(cwd, path.resolve(cwd, p)).split(path.sep).join('/')
            return path.posix.normalize(`${prefix}${relative}`)
        })
    }

    private async git(args: string[], timeoutMs?: number): Promise<string | null> {
        const timeout = timeoutMs ?? this.options.timeoutMs
        const result = await this.run(args, { cwd: this.options.cwd, timeout })
        if (result.ok) return result.stdout

        const fields = { args: args.join(' '), stderr: result.stderr.trim() }
        if (result.timedOut) {
            this.options.logger.warn({ ...fields, timeout }, 'git:timeout')
        } else {
            this.options.logger.debug(fields, 'git:failed')
        }
        return null
    }
}
