import { execaCommand } from 'execa'
import type { ResolvedConfig } from '../config/schema.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { HookName, HookResult } from './types.js'

const DEFAULT_HOOK_TIMEOUT = 10000

/**
 * Runs the operator's notification commands. Hooks never affect the
 * outcome of the operation that triggered them.
 */
export class HookRunner {
    constructor(
        private config: Pick<ResolvedConfig, 'hooks' | 'projectDir'>,
        private logger: Logger
    ) {}

    async run(hookName: HookName, env?: Record<string, string>): Promise<HookResult[]> {
        const hooks = this.config.hooks[hookName] ?? []
        if (hooks.length === 0) return []

        const results: HookResult[] = []

        for (const hook of hooks) {
            try {
                const { stdout, stderr, exitCode, timedOut } = await execaCommand(hook.command, {
                    timeout: hook.timeout ?? DEFAULT_HOOK_TIMEOUT,
                    env: { ...process.env, ...env },
                    cwd: this.config.projectDir,
                    reject: false,
                    shell: true,
                })

                if (exitCode === 0 && !timedOut) {
                    results.push({ hookName, success: true, output: stdout })
                    this.logger.debug({ hookName, command: hook.command }, 'hook:success')
                } else {
                    const error = timedOut ? 'timed out' : `exit code ${exitCode ?? 'unknown'}: ${stderr}`.trim()
                    results.push({ hookName, success: false, output: stdout, error })
                    this.logger.warn({ hookName, command: hook.command, error }, 'hook:failed')
                }
            } catch (error) {
                results.push({ hookName, success: false, error: errorMessage(error) })
                this.logger.warn({ hookName, error: errorMessage(error) }, 'hook:error')
            }
        }

        return results
    }
}
