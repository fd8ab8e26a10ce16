import { execa } from 'execa'
import { errorMessage } from '../core/errors.js'

export interface GitResult {
    ok: boolean
    stdout: string
    stderr: string
    timedOut: boolean
}

export interface GitRunOptions {
    cwd: string
    timeout: number
}

export type GitRunner = (args: string[], options: GitRunOptions) => Promise<GitResult>

export const execaGitRunner: GitRunner = async (args, { cwd, timeout }) => {
    try {
        // paths come back as UTF-8 rather than octal escapes
        const result = await execa('git', ['-c', 'core.quotePath=false', ...args], {
            cwd,
            timeout,
            reject: false,
            env: { GIT_OPTIONAL_LOCKS: '0', LC_ALL: 'C' },
        })
        return {
            ok: result.exitCode === 0 && !result.timedOut,
            stdout: result.stdout,
            stderr: result.stderr,
            timedOut: result.timedOut,
        }
    } catch (error) {
        return { ok: false, stdout: '', stderr: errorMessage(error), timedOut: false }
    }
}
