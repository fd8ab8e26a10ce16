import * as clack from '@clack/prompts'
import { errorMessage } from '../../core/errors.js'
import type { Container } from '../../core/container.js'
import { withLock } from '../../worklist/lock.js'
import { countItems } from '../../worklist/format.js'
import { parseTaskText } from '../../worklist/scan.js'
import type { WorklistUpdates } from '../../worklist/types.js'
import { clearSession, readSessionStart, startOfDay, startSession } from '../../session/marker.js'
import type { CloseSessionReport } from '../../session/types.js'
import { colors, formatError } from '../ui.js'
import { bootstrap, type GlobalOptions } from './shared.js'

export interface CloseOptions {
    since?: string
    done?: string[]
    start?: string[]
    task?: string[]
    notes?: string
    yes?: boolean
}

export async function sessionStartCommand(options: GlobalOptions): Promise<number> {
    const container = await bootstrap(options)
    try {
        const now = new Date()
        const { startedAt, created } = await startSession(container.fs, container.config.projectDir, now)
        console.log(
            created
                ? colors.success(`Session started at ${startedAt.toISOString()}`)
                : colors.dim(`Session already open since ${startedAt.toISOString()}`)
        )

        const doc = await container.worklist.load()
        const counts = countItems(doc.items)
        console.log(
            `Worklist: ${counts.total} total, ${counts.completed} completed, ${counts.inProgress} in progress, ${counts.pending} pending`
        )
        const urgent = doc.items.filter(
            (i) => i.status !== 'completed' && (i.priority === 'critical' || i.priority === 'high')
        )
        for (const item of urgent) {
            console.log(`  ${colors.warn(item.priority.padEnd(8))} ${item.id}: ${item.description}`)
        }
        return 0
    } catch (error) {
        console.error(formatError(errorMessage(error)))
        return 1
    } finally {
        container.shutdown()
    }
}

async function resolveWindowStart(container: Container, since: string | undefined, now: Date): Promise<Date> {
    if (since) {
        const parsed = new Date(since)
        if (Number.isNaN(parsed.getTime())) throw new Error(`--since is not a valid date: ${since}`)
        return parsed
    }
    return (await readSessionStart(container.fs, container.config.projectDir)) ?? startOfDay(now)
}

async function readNotes(container: Container, notesFile: string | undefined): Promise<string | null> {
    const file = notesFile ?? container.config.notesFile
    if (!(await container.fs.exists(file))) {
        if (notesFile) throw new Error(`notes file not found: ${notesFile}`)
        return null
    }
    return container.fs.readText(file)
}

export function updatesFromFlags(options: CloseOptions): WorklistUpdates {
    return {
        completed: (options.done ?? []).map((id) => id.toUpperCase()),
        started: (options.start ?? []).map((id) => id.toUpperCase()),
        mentioned: (options.task ?? []).map(parseTaskText).filter((t) => t.description.length > 0),
    }
}

async function confirmUncommitted(container: Container, options: CloseOptions): Promise<boolean> {
    if (options.yes || !process.stdin.isTTY) return true
    const changes = await container.inspector.uncommittedChanges()
    if (changes.length === 0) return true

    const answer = await clack.confirm({
        message: `${changes.length} uncommitted change(s) in the working tree. Close the session anyway?`,
        initialValue: false,
    })
    return !clack.isCancel(answer) && answer
}

function printReport(report: CloseSessionReport): void {
    const { metrics } = report.artifacts
    for (const file of report.written) console.log(`  ${colors.success('✓')} ${file}`)
    for (const failure of report.failures) {
        console.log(`  ${colors.error('✗')} ${failure.artifact}: ${failure.error}`)
    }
    console.log(
        colors.dim(
            `${metrics.commitCount} commit(s), ${metrics.filesChanged} file(s), +${metrics.linesAdded} -${metrics.linesRemoved}, ` +
                `tasks ${metrics.tasks.completed}/${metrics.tasks.total} completed`
        )
    )
    if (metrics.uncommittedChanges > 0) {
        console.log(colors.warn(`Warning: ${metrics.uncommittedChanges} uncommitted change(s) left in the working tree.`))
    }
}

/**
 * Exit 0 when at least one artifact was written, 1 when none could be or
 * when a fatal error happened before archiving started.
 */
export async function sessionCloseCommand(options: CloseOptions, globals: GlobalOptions): Promise<number> {
    let container: Container
    try {
        container = await bootstrap(globals)
    } catch (error) {
        console.error(formatError(errorMessage(error)))
        return 1
    }

    try {
        const now = new Date()
        const windowStart = await resolveWindowStart(container, options.since, now)
        const notes = await readNotes(container, options.notes)

        if (!(await confirmUncommitted(container, options))) {
            console.log(colors.warn('Session close cancelled.'))
            return 1
        }

        clack.intro(colors.brand('Closing session'))
        const report = await withLock(container.fs, container.lockPath, container.logger, () =>
            container.recorder.closeSession({ windowStart, now, notes, updates: updatesFromFlags(options) })
        )
        printReport(report)

        if (report.written.length === 0) {
            clack.outro(colors.error('No artifact could be written.'))
            return 1
        }

        await clearSession(container.fs, container.config.projectDir)
        await container.hookRunner.run('SessionEnd', {
            WARDEN_SESSION_DIR: report.artifacts.directory,
            WARDEN_SESSION_DATE: report.artifacts.date,
        })
        clack.outro(colors.success(`Session archived to ${report.artifacts.directory}`))
        return 0
    } catch (error) {
        console.error(formatError(errorMessage(error)))
        return 1
    } finally {
        container.shutdown()
    }
}
