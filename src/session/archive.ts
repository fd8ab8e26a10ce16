import path from 'node:path'
import { ArtifactWriteError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { writeFileAtomic } from '../core/fs.js'

/** Local calendar date, `YYYY-MM-DD`. */
export function dateKey(date: Date): string {
    const month = String(date.getMonth() + 1).padStart(2, '0')
    const day = String(date.getDate()).padStart(2, '0')
    return `${date.getFullYear()}-${month}-${day}`
}

/**
 * One directory per calendar date. A second close on the same date gets
 * `<date>-2`, then `<date>-3`, so earlier artifacts are never overwritten.
 */
export class SessionArchive {
    constructor(
        readonly root: string,
        private fs: FileSystem
    ) {}

    async allocate(date: string): Promise<string> {
        let dir = path.join(this.root, date)
        for (let n = 2; await this.fs.exists(dir); n++) {
            dir = path.join(this.root, `${date}-${n}`)
        }
        await this.fs.mkdir(dir)
        return dir
    }

    async write(dir: string, fileName: string, content: string): Promise<string> {
        const filePath = path.join(dir, fileName)
        try {
            await writeFileAtomic(this.fs, filePath, content)
        } catch (error) {
            throw new ArtifactWriteError(fileName, errorMessage(error), { cause: error })
        }
        return filePath
    }
}
