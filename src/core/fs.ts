import { randomBytes } from 'node:crypto'
import * as fsp from 'node:fs/promises'
import path from 'node:path'

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON<T>(path: string): Promise<T>
    writeText(path: string, content: string): Promise<void>
    exists(path: string): Promise<boolean>
    mkdir(path: string): Promise<void>
    rename(from: string, to: string): Promise<void>
    /** Creates the file only if it does not exist yet; rejects with code EEXIST otherwise. */
    createExclusive(path: string, content: string): Promise<void>
    remove(path: string): Promise<void>
}

export class NodeFileSystem implements FileSystem {
    async readText(filePath: string): Promise<string> {
        return fsp.readFile(filePath, 'utf8')
    }

    async readJSON<T>(filePath: string): Promise<T> {
        return JSON.parse(await this.readText(filePath)) as T
    }

    async writeText(filePath: string, content: string): Promise<void> {
        await fsp.writeFile(filePath, content, 'utf8')
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await fsp.access(filePath)
            return true
        } catch {
            return false
        }
    }

    async mkdir(dirPath: string): Promise<void> {
        await fsp.mkdir(dirPath, { recursive: true })
    }

    async rename(from: string, to: string): Promise<void> {
        await fsp.rename(from, to)
    }

    async createExclusive(filePath: string, content: string): Promise<void> {
        await fsp.writeFile(filePath, content, { encoding: 'utf8', flag: 'wx' })
    }

    async remove(filePath: string): Promise<void> {
        await fsp.rm(filePath, { recursive: true, force: true })
    }
}

/**
 * Write-to-temp-then-rename. A reader never observes a half-written file,
 * and an interrupted write leaves the previous content in place.
 */
export async function writeFileAtomic(fs: FileSystem, filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath)
    await fs.mkdir(dir)
    const tmp = path.join(dir, `.${path.basename(filePath)}.tmp-${randomBytes(4).toString('hex')}`)
    await fs.writeText(tmp, content)
    try {
        await fs.rename(tmp, filePath)
    } catch (error) {
        await fs.remove(tmp)
        throw error
    }
}

class MockFsError extends Error {
    constructor(
        readonly code: string,
        filePath: string
    ) {
        super(`${code}: ${filePath}`)
    }
}

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()
    private dirs = new Set<string>()
    private failing: Array<(path: string) => boolean> = []

    async readText(filePath: string): Promise<string> {
        const content = this.files.get(filePath)
        if (content === undefined) throw new MockFsError('ENOENT', filePath)
        return content
    }

    async readJSON<T>(filePath: string): Promise<T> {
        return JSON.parse(await this.readText(filePath)) as T
    }

    async writeText(filePath: string, content: string): Promise<void> {
        this.assertWritable(filePath)
        this.files.set(filePath, content)
    }

    async exists(filePath: string): Promise<boolean> {
        return this.files.has(filePath) || this.dirs.has(filePath)
    }

    async mkdir(dirPath: string): Promise<void> {
        this.assertWritable(dirPath)
        this.dirs.add(dirPath)
    }

    async rename(from: string, to: string): Promise<void> {
        const content = this.files.get(from)
        if (content === undefined) throw new MockFsError('ENOENT', from)
        this.assertWritable(to)
        this.files.delete(from)
        this.files.set(to, content)
    }

    async createExclusive(filePath: string, content: string): Promise<void> {
        if (this.files.has(filePath)) throw new MockFsError('EEXIST', filePath)
        await this.writeText(filePath, content)
    }

    async remove(filePath: string): Promise<void> {
        this.files.delete(filePath)
        this.dirs.delete(filePath)
    }

    setFile(filePath: string, content: string): void {
        this.files.set(filePath, content)
    }

    getFiles(): Map<string, string> {
        return new Map(this.files)
    }

    /** Makes every write whose target satisfies the predicate fail with EACCES. */
    failWrites(predicate: (path: string) => boolean): void {
        this.failing.push(predicate)
    }

    private assertWritable(filePath: string): void {
        if (this.failing.some((fail) => fail(filePath))) throw new MockFsError('EACCES', filePath)
    }
}
