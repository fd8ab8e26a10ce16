import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { MockFileSystem, NodeFileSystem, writeFileAtomic } from '../../../src/core/fs.js'
import { errorCode } from '../../../src/core/errors.js'

describe('MockFileSystem', () => {
    it('reads and writes text', async () => {
        const fs = new MockFileSystem()
        await fs.writeText('/test.txt', 'hello')
        expect(await fs.readText('/test.txt')).toBe('hello')
    })

    it('reads JSON', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/test.json', '{"key":"value"}')
        expect(await fs.readJSON('/test.json')).toEqual({ key: 'value' })
    })

    it('throws ENOENT on missing file', async () => {
        const fs = new MockFileSystem()
        await expect(fs.readText('/missing.txt')).rejects.toThrow('ENOENT')
    })

    it('checks existence of files and directories', async () => {
        const fs = new MockFileSystem()
        expect(await fs.exists('/dir')).toBe(false)
        await fs.mkdir('/dir')
        await fs.writeText('/dir/a.txt', 'data')
        expect(await fs.exists('/dir')).toBe(true)
        expect(await fs.exists('/dir/a.txt')).toBe(true)
    })

    it('renames files', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/a', 'content')
        await fs.rename('/a', '/b')
        expect(await fs.exists('/a')).toBe(false)
        expect(await fs.readText('/b')).toBe('content')
    })

    it('createExclusive rejects with EEXIST when the file exists', async () => {
        const fs = new MockFileSystem()
        await fs.createExclusive('/lock', '1')
        const failure = await fs.createExclusive('/lock', '2').catch((e: unknown) => e)
        expect(errorCode(failure)).toBe('EEXIST')
        expect(await fs.readText('/lock')).toBe('1')
    })

    it('failWrites makes matching writes fail with EACCES', async () => {
        const fs = new MockFileSystem()
        fs.failWrites((p) => p.endsWith('.md'))
        const failure = await fs.writeText('/x.md', 'a').catch((e: unknown) => e)
        expect(errorCode(failure)).toBe('EACCES')
        await fs.writeText('/x.txt', 'a')
        expect(fs.getFiles().get('/x.txt')).toBe('a')
    })
})

describe('writeFileAtomic', () => {
    it('writes through a temp file and leaves only the target', async () => {
        const fs = new MockFileSystem()
        await writeFileAtomic(fs, '/out/file.md', 'body')
        expect([...fs.getFiles().keys()]).toEqual(['/out/file.md'])
        expect(await fs.exists('/out')).toBe(true)
    })

    it('keeps the previous content when the rename fails', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/out/file.md', 'old')
        fs.failWrites((p) => p === '/out/file.md')
        await expect(writeFileAtomic(fs, '/out/file.md', 'new')).rejects.toThrow('EACCES')
        expect([...fs.getFiles().entries()]).toEqual([['/out/file.md', 'old']])
    })
})

describe('NodeFileSystem', () => {
    let dir = ''

    afterEach(async () => {
        if (dir) await rm(dir, { recursive: true, force: true })
    })

    it('writes atomically on disk', async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'warden-fs-'))
        const fs = new NodeFileSystem()
        const target = path.join(dir, 'nested', 'a.txt')
        await writeFileAtomic(fs, target, 'one')
        await writeFileAtomic(fs, target, 'two')
        expect(await readFile(target, 'utf8')).toBe('two')
        expect(await readdir(path.join(dir, 'nested'))).toEqual(['a.txt'])
    })

    it('createExclusive fails when the file exists', async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'warden-fs-'))
        const fs = new NodeFileSystem()
        const lock = path.join(dir, 'lock')
        await fs.createExclusive(lock, 'a')
        const failure = await fs.createExclusive(lock, 'b').catch((e: unknown) => e)
        expect(errorCode(failure)).toBe('EEXIST')
    })
})
