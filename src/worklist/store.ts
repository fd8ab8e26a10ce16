import type { FileSystem } from '../core/fs.js'
import { writeFileAtomic } from '../core/fs.js'
import type { WorkItem } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { countItems, DEFAULT_TITLE, parseWorklist, renderWorklist } from './format.js'
import type { WorklistCounts, WorklistDocument } from './types.js'

function emptyWorklist(): WorklistDocument {
    return { title: DEFAULT_TITLE, updatedAt: null, items: [], declaredCounts: null }
}

export class WorklistStore {
    constructor(
        readonly filePath: string,
        private fs: FileSystem,
        private logger: Logger
    ) {}

    async load(): Promise<WorklistDocument> {
        if (!(await this.fs.exists(this.filePath))) {
            this.logger.debug({ file: this.filePath }, 'worklist:missing')
            return emptyWorklist()
        }

        const doc = parseWorklist(await this.fs.readText(this.filePath))
        const actual = countItems(doc.items)
        const declared = doc.declaredCounts
        if (
            declared &&
            (declared.total !== actual.total ||
                declared.completed !== actual.completed ||
                declared.inProgress !== actual.inProgress ||
                declared.pending !== actual.pending)
        ) {
            this.logger.warn({ file: this.filePath, declared, actual }, 'worklist:summary-mismatch')
        }
        return doc
    }

    /** Writes atomically and returns the counts recorded in the Summary section. */
    async save(title: string, items: readonly WorkItem[], now: Date): Promise<WorklistCounts> {
        const content = renderWorklist({ title, updatedAt: now.toISOString(), items: [...items] })
        await writeFileAtomic(this.fs, this.filePath, content)
        const counts = countItems(items)
        this.logger.debug({ file: this.filePath, ...counts }, 'worklist:saved')
        return counts
    }
}
