import { execaCommand } from 'execa'
import { loadConfig } from '../../config/loader.js'
import { createContainer } from '../../core/container.js'
import { errorMessage } from '../../core/errors.js'
import { NodeFileSystem } from '../../core/fs.js'
import { countItems } from '../../worklist/format.js'
import { loadPolicy } from '../../policy/loader.js'
import { colors } from '../ui.js'
import type { GlobalOptions } from './shared.js'

interface Check {
    name: string
    status: 'ok' | 'warn' | 'error'
    message: string
}

export async function doctorCommand(options: GlobalOptions): Promise<number> {
    console.log(colors.brand('Warden Doctor\n'))

    const checks: Check[] = []
    const fs = new NodeFileSystem()
    const projectDir = options.project ?? process.cwd()

    checks.push({ name: 'Node', status: 'ok', message: process.version })

    try {
        const { stdout } = await execaCommand('git --version')
        checks.push({ name: 'Git', status: 'ok', message: stdout.trim() })
    } catch {
        checks.push({ name: 'Git', status: 'error', message: 'Not found (session archives will have no commit data)' })
    }

    try {
        const config = await loadConfig({ fs, projectDir })
        checks.push({ name: 'Config', status: 'ok', message: 'Valid' })

        const container = createContainer({ ...config, logLevel: 'silent' }, { fs })
        try {
            if (await container.inspector.isAvailable()) {
                checks.push({ name: 'Repository', status: 'ok', message: await container.inspector.currentBranch() })
            } else {
                checks.push({ name: 'Repository', status: 'warn', message: 'Not a git work tree' })
            }

            try {
                const policy = await loadPolicy(config, fs)
                const total =
                    policy.protectedFiles.rules.length +
                    policy.dangerousCommands.rules.length +
                    policy.cautionCommands.rules.length
                checks.push({ name: 'Rules', status: 'ok', message: `${total} rules loaded` })
            } catch (error) {
                checks.push({ name: 'Rules', status: 'error', message: `${errorMessage(error)} (gates in lockdown)` })
            }

            const doc = await container.worklist.load()
            const counts = countItems(doc.items)
            const declared = doc.declaredCounts
            if (declared && declared.total !== counts.total) {
                checks.push({
                    name: 'Worklist',
                    status: 'warn',
                    message: `Summary says ${declared.total} items, file has ${counts.total}`,
                })
            } else {
                checks.push({ name: 'Worklist', status: 'ok', message: `${counts.total} items` })
            }
        } finally {
            container.shutdown()
        }
    } catch (error) {
        checks.push({ name: 'Config', status: 'error', message: `${errorMessage(error)} (gates in lockdown)` })
    }

    for (const check of checks) {
        const icon =
            check.status === 'ok' ? colors.success('✓') : check.status === 'warn' ? colors.warn('!') : colors.error('✗')
        console.log(`  ${icon} ${check.name.padEnd(15)} ${check.message}`)
    }

    const errors = checks.filter((c) => c.status === 'error')
    console.log('')
    if (errors.length === 0) {
        console.log(colors.success('All good.'))
        return 0
    }
    console.log(colors.warn(`${errors.length} problem(s) found.`))
    return 1
}
