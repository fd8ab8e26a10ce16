import type { ResolvedConfig } from './schema.js'

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/warden`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.warden'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
export const RULES_DIR = `${LOCAL_CONFIG_DIR}/rules`
export const SESSION_MARKER_FILE = `${LOCAL_CONFIG_DIR}/session.json`
export const LOCK_FILE = `${LOCAL_CONFIG_DIR}/session.lock`

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    logLevel: 'info',
    gitTimeoutMs: 10000,
    archiveDir: `${LOCAL_CONFIG_DIR}/sessions`,
    worklistFile: `${LOCAL_CONFIG_DIR}/WORKLIST.md`,
    notesFile: `${LOCAL_CONFIG_DIR}/session-notes.md`,
    rules: {},
    extraRules: {},
    effortHours: { critical: 8, high: 4, medium: 2, low: 1 },
    hooks: {},
}
