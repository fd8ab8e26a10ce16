import path from 'node:path'
import type { ResolvedConfig, RuleLists } from '../config/schema.js'
import { RULES_DIR } from '../config/defaults.js'
import { ConfigurationError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { DEFAULT_RULES } from './defaults.js'
import { createRuleSet } from './matcher.js'
import type { Policy, RuleSetName } from './types.js'

const CONFIG_KEYS: Record<RuleSetName, keyof RuleLists> = {
    'protected-files': 'protectedFiles',
    'dangerous-commands': 'dangerousCommands',
    'caution-commands': 'cautionCommands',
}

/** One pattern per line; blank lines and `#` comments are ignored. */
export function parseRuleFile(content: string): string[] {
    return content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith('#'))
}

async function readRuleFile(fs: FileSystem, filePath: string): Promise<string[] | null> {
    if (!(await fs.exists(filePath))) return null
    try {
        return parseRuleFile(await fs.readText(filePath))
    } catch (error) {
        throw new ConfigurationError(`Cannot read rule file ${filePath}: ${errorMessage(error)}`, { cause: error })
    }
}

async function resolvePatterns(
    name: RuleSetName,
    config: Pick<ResolvedConfig, 'projectDir' | 'rules' | 'extraRules'>,
    fs: FileSystem
): Promise<string[]> {
    const key = CONFIG_KEYS[name]
    const fromFile = await readRuleFile(fs, path.join(config.projectDir, RULES_DIR, `${name}.txt`))
    const base = fromFile ?? config.rules[key] ?? DEFAULT_RULES[name]
    return [...base, ...(config.extraRules[key] ?? [])]
}

/**
 * Loads and compiles all rule sets once. Throws ConfigurationError on the
 * first malformed pattern; callers must not fall back to a partial policy.
 */
export async function loadPolicy(
    config: Pick<ResolvedConfig, 'projectDir' | 'rules' | 'extraRules'>,
    fs: FileSystem
): Promise<Policy> {
    const [protectedFiles, dangerousCommands, cautionCommands] = await Promise.all([
        resolvePatterns('protected-files', config, fs),
        resolvePatterns('dangerous-commands', config, fs),
        resolvePatterns('caution-commands', config, fs),
    ])

    return Object.freeze({
        protectedFiles: createRuleSet('protected-files', 'block', protectedFiles),
        dangerousCommands: createRuleSet('dangerous-commands', 'block', dangerousCommands),
        cautionCommands: createRuleSet('caution-commands', 'caution', cautionCommands),
    })
}

export function defaultPolicy(): Policy {
    return Object.freeze({
        protectedFiles: createRuleSet('protected-files', 'block', DEFAULT_RULES['protected-files']),
        dangerousCommands: createRuleSet('dangerous-commands', 'block', DEFAULT_RULES['dangerous-commands']),
        cautionCommands: createRuleSet('caution-commands', 'caution', DEFAULT_RULES['caution-commands']),
    })
}
