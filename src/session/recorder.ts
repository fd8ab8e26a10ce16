import type { Priority, WorkItem } from '../core/types.js'
import { errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { RepositoryInspector } from '../repo/inspector.js'
import type { WorkingTreeChange } from '../repo/types.js'
import { DEFAULT_TITLE } from '../worklist/format.js'
import { mergeWorklist } from '../worklist/merge.js'
import { combineUpdates, scanWorkUpdates } from '../worklist/scan.js'
import type { WorklistStore } from '../worklist/store.js'
import { type SessionArchive, dateKey } from './archive.js'
import { classifyCommits, groupByCategory } from './classifier.js'
import { computeMetrics } from './metrics.js'
import { renderChangelog, renderMetrics, renderSummary, renderWorklistSnapshot } from './render.js'
import {
    ARTIFACT_FILES,
    ARTIFACT_NAMES,
    type ArtifactFailure,
    type ArtifactName,
    type CloseSessionReport,
    type SessionContext,
    type SessionRecord,
} from './types.js'

interface RecorderDeps {
    inspector: RepositoryInspector
    worklist: WorklistStore
    archive: SessionArchive
    logger: Logger
    effortHours: Record<Priority, number>
    eventBus?: TypedEventEmitter
}

const RENDERERS: Record<ArtifactName, (record: SessionRecord) => string> = {
    summary: renderSummary,
    worklist: renderWorklistSnapshot,
    changelog: renderChangelog,
    metrics: renderMetrics,
}

export class SessionRecorder {
    constructor(private deps: RecorderDeps) {}

    /**
     * Builds the session record from repository and worklist state, writes
     * the four artifacts independently and updates the live worklist. Only
     * a failure to read the worklist file aborts the worklist update; every
     * other failure is collected in the report.
     */
    async closeSession(context: SessionContext): Promise<CloseSessionReport> {
        const { inspector, worklist, logger } = this.deps
        const failures: ArtifactFailure[] = []

        const repositoryAvailable = await inspector.isAvailable()
        if (!repositoryAvailable) logger.warn('session:repository-unavailable')

        const branch = await inspector.currentBranch()
        const commits = classifyCommits(repositoryAvailable ? await inspector.commitsSince(context.windowStart) : [])
        const uncommitted: WorkingTreeChange[] = repositoryAvailable ? await inspector.uncommittedChanges() : []

        let title = DEFAULT_TITLE
        let current: WorkItem[] = []
        let worklistReadable = true
        try {
            const doc = await worklist.load()
            title = doc.title
            current = doc.items
        } catch (error) {
            worklistReadable = false
            failures.push({ artifact: 'worklist', error: `cannot read ${worklist.filePath}: ${errorMessage(error)}` })
            logger.error({ error: errorMessage(error) }, 'session:worklist-unreadable')
        }

        const updates = combineUpdates(
            context.updates,
            scanWorkUpdates(context.notes ?? ''),
            ...commits.map((c) => scanWorkUpdates(c.message))
        )
        const merge = mergeWorklist(current, updates)

        const metrics = computeMetrics({
            durationMs: Math.max(0, context.now.getTime() - context.windowStart.getTime()),
            commits,
            uncommittedChanges: uncommitted.length,
            items: merge.items,
            effortHours: this.deps.effortHours,
        })

        const record: SessionRecord = {
            date: dateKey(context.now),
            windowStart: context.windowStart,
            now: context.now,
            branch,
            repositoryAvailable,
            commits,
            uncommitted,
            items: merge.items,
            merge,
            metrics,
        }

        const { directory, written } = await this.writeArtifacts(record, failures)

        let worklistUpdated = false
        if (worklistReadable) {
            try {
                await worklist.save(title, merge.items, context.now)
                worklistUpdated = true
            } catch (error) {
                failures.push({ artifact: 'worklist', error: `cannot write ${worklist.filePath}: ${errorMessage(error)}` })
                logger.error({ error: errorMessage(error) }, 'session:worklist-write-failed')
            }
        }

        this.deps.eventBus?.emit('session:closed', {
            directory,
            written,
            failed: failures.map((f) => f.artifact),
        })

        return {
            artifacts: {
                date: record.date,
                directory,
                summary: renderSummary(record),
                worklistSnapshot: merge.items,
                changelog: groupByCategory(commits),
                metrics,
            },
            written,
            failures,
            worklistUpdated,
        }
    }

    private async writeArtifacts(
        record: SessionRecord,
        failures: ArtifactFailure[]
    ): Promise<{ directory: string; written: string[] }> {
        const { archive, logger, eventBus } = this.deps
        const written: string[] = []

        let directory: string
        try {
            directory = await archive.allocate(record.date)
        } catch (error) {
            const message = `cannot create archive directory under ${archive.root}: ${errorMessage(error)}`
            failures.push({ artifact: 'archive', error: message })
            logger.error({ error: message }, 'session:archive-failed')
            return { directory: '', written }
        }

        for (const name of ARTIFACT_NAMES) {
            try {
                const content = RENDERERS[name](record)
                written.push(await archive.write(directory, ARTIFACT_FILES[name], content))
            } catch (error) {
                failures.push({ artifact: name, error: errorMessage(error) })
                logger.error({ artifact: name, error: errorMessage(error) }, 'session:artifact-failed')
                eventBus?.emit('artifact:failed', { artifact: name, error: errorMessage(error) })
            }
        }

        logger.info({ directory, written: written.length }, 'session:archived')
        return { directory, written }
    }
}
