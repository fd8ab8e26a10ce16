import path from 'node:path'
import { errorCode, LockHeldError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'

export const STALE_LOCK_MS = 10 * 60 * 1000

interface LockInfo {
    pid: number
    acquiredAt: string
}

function isLockInfo(value: unknown): value is LockInfo {
    return (
        typeof value === 'object' &&
        value !== null &&
        'pid' in value &&
        typeof value.pid === 'number' &&
        'acquiredAt' in value &&
        typeof value.acquiredAt === 'string'
    )
}

async function isStale(fs: FileSystem, lockPath: string, now: Date): Promise<boolean> {
    try {
        const info = await fs.readJSON<unknown>(lockPath)
        if (!isLockInfo(info)) return true
        return now.getTime() - Date.parse(info.acquiredAt) > STALE_LOCK_MS
    } catch {
        // unreadable lock content is treated as abandoned
        return true
    }
}

/**
 * Exclusive lock file for a read-modify-write pass. A lock older than
 * STALE_LOCK_MS is assumed to belong to a crashed run and is taken over.
 */
export async function withLock<T>(
    fs: FileSystem,
    lockPath: string,
    logger: Logger,
    fn: () => Promise<T>,
    now: Date = new Date()
): Promise<T> {
    const content = JSON.stringify({ pid: process.pid, acquiredAt: now.toISOString() } satisfies LockInfo)

    await fs.mkdir(path.dirname(lockPath))
    try {
        await fs.createExclusive(lockPath, content)
    } catch (error) {
        if (errorCode(error) !== 'EEXIST') throw error
        if (!(await isStale(fs, lockPath, now))) throw new LockHeldError(lockPath)
        logger.warn({ lockPath }, 'lock:stale-taken-over')
        await fs.remove(lockPath)
        try {
            await fs.createExclusive(lockPath, content)
        } catch (retryError) {
            if (errorCode(retryError) === 'EEXIST') throw new LockHeldError(lockPath, { cause: retryError })
            throw retryError
        }
    }

    try {
        return await fn()
    } finally {
        await fs.remove(lockPath)
    }
}
