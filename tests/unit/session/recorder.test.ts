import { describe, it, expect, vi } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'
import { loadConfig } from '../../../src/config/loader.js'
import { createContainer } from '../../../src/core/container.js'
import type { GitRunner } from '../../../src/repo/git-runner.js'
import type { SessionContext } from '../../../src/session/types.js'
import { fakeGit, logRecord, noRepository } from '../../helpers/fake-git.js'
import { silentLogger } from '../../helpers/logger.js'

const PROJECT = '/work/project'
const ARCHIVE = `${PROJECT}/.warden/sessions`
const WORKLIST = `${PROJECT}/.warden/WORKLIST.md`
const FEATURE_HASH = `a1b2c3d${'0'.repeat(33)}`
const FIX_HASH = `e4f5a6b${'0'.repeat(33)}`

const context: SessionContext = {
    windowStart: new Date('2026-03-02T08:00:00Z'),
    now: new Date('2026-03-02T10:30:00Z'),
    updates: { completed: [], started: ['WL-001'], mentioned: [{ description: 'Write changelog' }] },
    notes: 'TODO: document rule files (low)',
}

const worklistFile = [
    '# Worklist',
    '',
    '## Critical',
    '- [ ] WL-002: Command gate',
    '## High',
    '- [ ] WL-001: Add retries',
    '## Low',
    '- [~] WL-003: Tidy logs',
].join('\n')

function repository(status = ''): GitRunner {
    return fakeGit({
        'rev-parse': (args) => ({
            ok: true,
            stdout: args[1] === '--show-prefix' ? '\n' : 'true\n',
            stderr: '',
            timedOut: false,
        }),
        'symbolic-ref': 'main\n',
        status,
        log:
            logRecord(FEATURE_HASH, '2026-03-02T09:00:00+00:00', 'feat: add command gate (closes WL-002)', [
                '120\t4\tsrc/gates/command-gate.ts',
            ]) +
            logRecord(FIX_HASH, '2026-03-02T10:00:00+00:00', 'fix: handle detached head', [
                '3\t1\tsrc/repo/inspector.ts',
                '2\t0\tsrc/gates/command-gate.ts',
            ]),
    })
}

async function setup(gitRunner: GitRunner, fs = new MockFileSystem()) {
    if (!(await fs.exists(WORKLIST))) fs.setFile(WORKLIST, worklistFile)
    const config = await loadConfig({ fs, projectDir: PROJECT })
    const container = createContainer(config, { fs, logger: silentLogger, gitRunner })
    return { fs, container }
}

describe('SessionRecorder', () => {
    it('writes the four artifacts into the date directory', async () => {
        const { fs, container } = await setup(repository())
        const report = await container.recorder.closeSession(context)

        expect(report.failures).toEqual([])
        expect(report.artifacts.date).toBe('2026-03-02')
        expect(report.artifacts.directory).toBe(`${ARCHIVE}/2026-03-02`)
        expect(report.written).toEqual([
            `${ARCHIVE}/2026-03-02/SUMMARY.md`,
            `${ARCHIVE}/2026-03-02/WORKLIST.md`,
            `${ARCHIVE}/2026-03-02/CHANGELOG.md`,
            `${ARCHIVE}/2026-03-02/METRICS.txt`,
        ])
        expect(await fs.readText(`${ARCHIVE}/2026-03-02/SUMMARY.md`)).toBe(report.artifacts.summary)
    })

    it('renders the metrics report', async () => {
        const { fs, container } = await setup(repository())
        await container.recorder.closeSession(context)

        expect(await fs.readText(`${ARCHIVE}/2026-03-02/METRICS.txt`)).toBe(
            [
                'SESSION METRICS 2026-03-02',
                '',
                'duration: 2h 30m',
                'repository: available',
                'commits: 2',
                'files_changed: 2',
                'lines_added: 125',
                'lines_removed: 5',
                'net_lines: 120',
                'uncommitted_changes: 0',
                '',
                'commits_security: 0',
                'commits_fix: 1',
                'commits_feature: 1',
                'commits_docs: 0',
                'commits_refactor: 0',
                'commits_other: 0',
                '',
                'tasks_total: 5',
                'tasks_completed: 1',
                'tasks_in_progress: 2',
                'tasks_pending: 2',
                'completion_rate: 20.0%',
                '',
                'effort_critical: 0 open, 0h',
                'effort_high: 1 open, 4h',
                'effort_medium: 1 open, 2h',
                'effort_low: 2 open, 2h',
                'effort_total: 8h',
                '',
            ].join('\n')
        )
    })

    it('groups commits by category in the changelog', async () => {
        const { fs, container } = await setup(repository())
        await container.recorder.closeSession(context)

        const changelog = await fs.readText(`${ARCHIVE}/2026-03-02/CHANGELOG.md`)
        expect(changelog.split('\n').slice(0, 20)).toEqual([
            '# Changelog: 2026-03-02',
            '',
            '## SECURITY',
            '',
            'None.',
            '',
            '## FIX',
            '',
            '### e4f5a6b fix: handle detached head',
            '',
            'Date: 2026-03-02T10:00:00+00:00',
            '',
            '- src/repo/inspector.ts (+3 -1)',
            '- src/gates/command-gate.ts (+2 -0)',
            '',
            '## FEATURE',
            '',
            '### a1b2c3d feat: add command gate (closes WL-002)',
            '',
            'Date: 2026-03-02T09:00:00+00:00',
        ])
    })

    it('merges flags, notes and commit messages into the live worklist', async () => {
        const { container } = await setup(repository())
        const report = await container.recorder.closeSession(context)

        expect(report.worklistUpdated).toBe(true)
        const doc = await container.worklist.load()
        expect(doc.items).toEqual([
            { id: 'WL-002', description: 'Command gate', priority: 'critical', status: 'completed' },
            { id: 'WL-001', description: 'Add retries', priority: 'high', status: 'in_progress' },
            { id: 'WL-004', description: 'Write changelog', priority: 'medium', status: 'pending' },
            { id: 'WL-003', description: 'Tidy logs', priority: 'low', status: 'in_progress' },
            { id: 'WL-005', description: 'document rule files', priority: 'low', status: 'pending' },
        ])
        expect(doc.updatedAt).toBe('2026-03-02T10:30:00.000Z')
    })

    it('a second close on the same day gets its own directory and changes nothing new', async () => {
        const { fs, container } = await setup(repository())
        await container.recorder.closeSession(context)
        const afterFirst = await fs.readText(WORKLIST)
        const second = await container.recorder.closeSession(context)

        expect(second.artifacts.directory).toBe(`${ARCHIVE}/2026-03-02-2`)
        expect(await fs.readText(WORKLIST)).toBe(afterFirst)
        expect(await fs.readText(`${ARCHIVE}/2026-03-02/WORKLIST.md`)).toBe(
            await fs.readText(`${ARCHIVE}/2026-03-02-2/WORKLIST.md`)
        )
    })

    it('carries on when one artifact cannot be written', async () => {
        const fs = new MockFileSystem()
        fs.failWrites((p) => p.endsWith('CHANGELOG.md'))
        const { container } = await setup(repository(), fs)
        const failed = vi.fn()
        container.eventBus.on('artifact:failed', failed)

        const report = await container.recorder.closeSession(context)

        expect(report.written.map((p) => p.slice(ARCHIVE.length + 12))).toEqual(['SUMMARY.md', 'WORKLIST.md', 'METRICS.txt'])
        expect(report.failures).toEqual([
            { artifact: 'changelog', error: `CHANGELOG.md: EACCES: ${ARCHIVE}/2026-03-02/CHANGELOG.md` },
        ])
        expect(failed).toHaveBeenCalledWith({ artifact: 'changelog', error: `CHANGELOG.md: EACCES: ${ARCHIVE}/2026-03-02/CHANGELOG.md` })
        expect(report.worklistUpdated).toBe(true)
    })

    it('reports an archive failure and still updates the worklist', async () => {
        const fs = new MockFileSystem()
        fs.failWrites((p) => p.startsWith(ARCHIVE))
        const { container } = await setup(repository(), fs)

        const report = await container.recorder.closeSession(context)

        expect(report.written).toEqual([])
        expect(report.failures.map((f) => f.artifact)).toEqual(['archive'])
        expect(report.worklistUpdated).toBe(true)
    })

    it('does not rewrite a worklist it could not read', async () => {
        const fs = new MockFileSystem()
        await fs.mkdir(WORKLIST)
        const { container } = await setup(repository(), fs)

        const report = await container.recorder.closeSession(context)

        expect(report.worklistUpdated).toBe(false)
        expect(report.failures.map((f) => f.artifact)).toEqual(['worklist'])
        expect(report.written).toHaveLength(4)
        expect(fs.getFiles().has(WORKLIST)).toBe(false)
    })

    it('flags uncommitted changes in the summary', async () => {
        const { container } = await setup(repository(' M src/index.ts\0'))
        const report = await container.recorder.closeSession(context)
        expect(report.artifacts.summary).toContain(
            '\nWARNING: 1 uncommitted change(s) in the working tree. Commit or stash them before ending the session.\n'
        )
    })

    it('records a session without a repository', async () => {
        const { fs, container } = await setup(noRepository)
        const report = await container.recorder.closeSession(context)

        expect(report.written).toHaveLength(4)
        expect(report.artifacts.summary).toContain('\n- Branch: (no repository)\n')
        expect(report.artifacts.summary).toContain('\n- Repository: Repository data unavailable\n')
        const changelog = await fs.readText(`${ARCHIVE}/2026-03-02/CHANGELOG.md`)
        expect(changelog.split('\n')[2]).toBe('Repository data unavailable. No commits this session.')
        expect(report.artifacts.metrics.commitCount).toBe(0)
    })

    it('emits session:closed with what was written and what failed', async () => {
        const { container } = await setup(repository())
        const closed = vi.fn()
        container.eventBus.on('session:closed', closed)
        const report = await container.recorder.closeSession(context)
        expect(closed).toHaveBeenCalledWith({ directory: `${ARCHIVE}/2026-03-02`, written: report.written, failed: [] })
    })
})
