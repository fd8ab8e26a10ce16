import { Priority } from '../../core/types.js'
import { errorMessage } from '../../core/errors.js'
import { countItems } from '../../worklist/format.js'
import { colors, formatError } from '../ui.js'
import { bootstrap, type GlobalOptions } from './shared.js'

const MARKS = { pending: '[ ]', in_progress: '[~]', completed: '[x]' } as const

export async function worklistCommand(options: GlobalOptions & { all?: boolean }): Promise<number> {
    const container = await bootstrap(options)
    try {
        const doc = await container.worklist.load()
        const counts = countItems(doc.items)
        console.log(colors.bold(doc.title))
        console.log(
            colors.dim(
                `${counts.total} total, ${counts.completed} completed, ${counts.inProgress} in progress, ${counts.pending} pending`
            )
        )

        for (const priority of Priority) {
            const items = doc.items.filter((i) => i.priority === priority && (options.all || i.status !== 'completed'))
            if (items.length === 0) continue
            console.log(`\n${colors.bold(priority.toUpperCase())}`)
            for (const item of items) console.log(`  ${MARKS[item.status]} ${item.id}: ${item.description}`)
        }
        return 0
    } catch (error) {
        console.error(formatError(errorMessage(error)))
        return 1
    } finally {
        container.shutdown()
    }
}
