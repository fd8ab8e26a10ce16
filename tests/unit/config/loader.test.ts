import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'
import { loadConfig } from '../../../src/config/loader.js'
import { GLOBAL_CONFIG_FILE } from '../../../src/config/defaults.js'
import { ConfigurationError } from '../../../src/core/errors.js'

const PROJECT = '/work/project'

describe('loadConfig', () => {
    const originalEnv = process.env

    beforeEach(() => {
        process.env = { ...originalEnv }
        delete process.env.WARDEN_LOG_LEVEL
        delete process.env.WARDEN_GIT_TIMEOUT
        delete process.env.WARDEN_ARCHIVE_DIR
    })

    afterEach(() => {
        process.env = originalEnv
    })

    it('returns defaults when no config files exist', async () => {
        const config = await loadConfig({ fs: new MockFileSystem(), projectDir: PROJECT })
        expect(config.logLevel).toBe('info')
        expect(config.gitTimeoutMs).toBe(10000)
        expect(config.archiveDir).toBe('/work/project/.warden/sessions')
        expect(config.worklistFile).toBe('/work/project/.warden/WORKLIST.md')
        expect(config.notesFile).toBe('/work/project/.warden/session-notes.md')
        expect(config.effortHours).toEqual({ critical: 8, high: 4, medium: 2, low: 1 })
        expect(config.rules).toEqual({})
        expect(config.projectDir).toBe(PROJECT)
    })

    it('local config overrides global config', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ logLevel: 'warn', gitTimeoutMs: 3000 }))
        fs.setFile(`${PROJECT}/.warden/config.json`, JSON.stringify({ logLevel: 'debug' }))
        const config = await loadConfig({ fs, projectDir: PROJECT })
        expect(config.logLevel).toBe('debug')
        expect(config.gitTimeoutMs).toBe(3000)
    })

    it('env vars override files and CLI flags override env', async () => {
        const fs = new MockFileSystem()
        fs.setFile(`${PROJECT}/.warden/config.json`, JSON.stringify({ logLevel: 'debug', archiveDir: 'out' }))
        process.env.WARDEN_LOG_LEVEL = 'error'
        process.env.WARDEN_ARCHIVE_DIR = '/var/archive'
        process.env.WARDEN_GIT_TIMEOUT = '2500'
        const config = await loadConfig({ fs, projectDir: PROJECT, cliFlags: { logLevel: 'trace' } })
        expect(config.logLevel).toBe('trace')
        expect(config.archiveDir).toBe('/var/archive')
        expect(config.gitTimeoutMs).toBe(2500)
    })

    it('merges partial effort hours with defaults', async () => {
        const fs = new MockFileSystem()
        fs.setFile(`${PROJECT}/.warden/config.json`, JSON.stringify({ effortHours: { critical: 16 } }))
        const config = await loadConfig({ fs, projectDir: PROJECT })
        expect(config.effortHours).toEqual({ critical: 16, high: 4, medium: 2, low: 1 })
    })

    it('rejects invalid JSON', async () => {
        const fs = new MockFileSystem()
        fs.setFile(`${PROJECT}/.warden/config.json`, '{ not json')
        await expect(loadConfig({ fs, projectDir: PROJECT })).rejects.toBeInstanceOf(ConfigurationError)
    })

    it('rejects unknown keys with the offending path', async () => {
        const fs = new MockFileSystem()
        fs.setFile(`${PROJECT}/.warden/config.json`, JSON.stringify({ rules: { protected: ['x'] } }))
        await expect(loadConfig({ fs, projectDir: PROJECT })).rejects.toThrow(
            '/work/project/.warden/config.json is invalid: rules:'
        )
    })

    it('rejects a non-numeric git timeout', async () => {
        process.env.WARDEN_GIT_TIMEOUT = 'soon'
        await expect(loadConfig({ fs: new MockFileSystem(), projectDir: PROJECT })).rejects.toThrow(
            "WARDEN_GIT_TIMEOUT must be a positive integer, got 'soon'"
        )
    })

    it('rejects an unknown log level', async () => {
        process.env.WARDEN_LOG_LEVEL = 'loud'
        await expect(loadConfig({ fs: new MockFileSystem(), projectDir: PROJECT })).rejects.toThrow(
            "WARDEN_LOG_LEVEL has unknown level 'loud'"
        )
    })
})
