import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { ConfigurationError, errorMessage } from '../core/errors.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
}

// Unlike a preferences file, a broken config here must not be skipped:
// the rule lists live in it and gates have to fail closed.
async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}

    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new ConfigurationError(`${filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error })
    }

    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
        throw new ConfigurationError(`${filePath} is invalid: ${issues}`)
    }
    return parsed.data
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined) {
                ;(merged as Record<string, unknown>)[key] = value
            }
        }
    }
    return merged
}

function envConfig(): Config {
    const env: Config = {}

    const level = process.env.WARDEN_LOG_LEVEL
    if (level) {
        const parsed = LogLevelSchema.safeParse(level)
        if (!parsed.success) throw new ConfigurationError(`WARDEN_LOG_LEVEL has unknown level '${level}'`)
        env.logLevel = parsed.data
    }

    const timeout = process.env.WARDEN_GIT_TIMEOUT
    if (timeout) {
        const ms = Number(timeout)
        if (!Number.isInteger(ms) || ms <= 0) {
            throw new ConfigurationError(`WARDEN_GIT_TIMEOUT must be a positive integer, got '${timeout}'`)
        }
        env.gitTimeoutMs = ms
    }

    if (process.env.WARDEN_ARCHIVE_DIR) env.archiveDir = process.env.WARDEN_ARCHIVE_DIR

    return env
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd() } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(), cliFlags)
    const resolve = (p: string) => path.resolve(projectDir, p)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        archiveDir: resolve(merged.archiveDir ?? DEFAULT_CONFIG.archiveDir),
        worklistFile: resolve(merged.worklistFile ?? DEFAULT_CONFIG.worklistFile),
        notesFile: resolve(merged.notesFile ?? DEFAULT_CONFIG.notesFile),
        rules: { ...DEFAULT_CONFIG.rules, ...merged.rules },
        extraRules: { ...DEFAULT_CONFIG.extraRules, ...merged.extraRules },
        effortHours: { ...DEFAULT_CONFIG.effortHours, ...merged.effortHours },
        hooks: { ...DEFAULT_CONFIG.hooks, ...merged.hooks },
        projectDir,
        configDir: CONFIG_DIR,
    }
}
