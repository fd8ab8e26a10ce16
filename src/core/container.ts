import path from 'node:path'
import type { ResolvedConfig } from '../config/schema.js'
import { LOCK_FILE, SESSION_MARKER_FILE } from '../config/defaults.js'
import { createGuard, type GateCapability } from '../gates/guard.js'
import { HookRunner } from '../hooks/runner.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { RepositoryInspector } from '../repo/inspector.js'
import type { GitRunner } from '../repo/git-runner.js'
import { SessionArchive } from '../session/archive.js'
import { SessionRecorder } from '../session/recorder.js'
import { WorklistStore } from '../worklist/store.js'
import { TypedEventEmitter } from './events.js'
import { NodeFileSystem, type FileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    inspector: RepositoryInspector
    worklist: WorklistStore
    archive: SessionArchive
    recorder: SessionRecorder
    hookRunner: HookRunner
    lockPath: string
    createGuard(): Promise<GateCapability>
    shutdown(): void
}

interface ContainerOverrides {
    fs?: FileSystem
    logger?: Logger
    gitRunner?: GitRunner
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = overrides.fs ?? new NodeFileSystem()
    const inspector = new RepositoryInspector({
        cwd: config.projectDir,
        timeoutMs: config.gitTimeoutMs,
        logger,
        run: overrides.gitRunner,
        ignorePaths: [LOCK_FILE, SESSION_MARKER_FILE, config.archiveDir, config.worklistFile],
    })
    const worklist = new WorklistStore(config.worklistFile, fs, logger)
    const archive = new SessionArchive(config.archiveDir, fs)
    const recorder = new SessionRecorder({
        inspector,
        worklist,
        archive,
        logger,
        effortHours: config.effortHours,
        eventBus,
    })
    const hookRunner = new HookRunner(config, logger)

    return {
        config,
        logger,
        eventBus,
        fs,
        inspector,
        worklist,
        archive,
        recorder,
        hookRunner,
        lockPath: path.join(config.projectDir, LOCK_FILE),

        createGuard() {
            return createGuard(config, fs, logger, eventBus)
        },

        shutdown() {
            eventBus.removeAll()
            logger.flush()
        },
    }
}
