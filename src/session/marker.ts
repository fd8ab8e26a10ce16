import path from 'node:path'
import { z } from 'zod'
import { SESSION_MARKER_FILE } from '../config/defaults.js'
import type { FileSystem } from '../core/fs.js'
import { writeFileAtomic } from '../core/fs.js'

const MarkerSchema = z.object({ startedAt: z.string().datetime() })

function markerPath(projectDir: string): string {
    return path.join(projectDir, SESSION_MARKER_FILE)
}

export async function readSessionStart(fs: FileSystem, projectDir: string): Promise<Date | null> {
    const file = markerPath(projectDir)
    if (!(await fs.exists(file))) return null
    try {
        const parsed = MarkerSchema.safeParse(await fs.readJSON<unknown>(file))
        return parsed.success ? new Date(parsed.data.startedAt) : null
    } catch {
        // corrupt marker: treated as absent, the next start rewrites it
        return null
    }
}

/** Opens a session unless one is already open; returns the effective start. */
export async function startSession(
    fs: FileSystem,
    projectDir: string,
    now: Date
): Promise<{ startedAt: Date; created: boolean }> {
    const existing = await readSessionStart(fs, projectDir)
    if (existing) return { startedAt: existing, created: false }
    await writeFileAtomic(fs, markerPath(projectDir), JSON.stringify({ startedAt: now.toISOString() }, null, 2))
    return { startedAt: now, created: true }
}

export async function clearSession(fs: FileSystem, projectDir: string): Promise<void> {
    await fs.remove(markerPath(projectDir))
}

export function startOfDay(date: Date): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate())
}
