export type Severity = 'block' | 'caution'

export type RuleSetName = 'protected-files' | 'dangerous-commands' | 'caution-commands'

export type TextMatcher = { kind: 'substring'; text: string } | { kind: 'regex'; regex: RegExp }

export interface PolicyRule {
    readonly id: string
    /** The pattern as written in configuration. */
    readonly source: string
    readonly pattern: TextMatcher
    readonly severity: Severity
}

export interface RuleSet {
    readonly name: RuleSetName
    readonly severity: Severity
    readonly rules: readonly PolicyRule[]
}

export interface MatchResult {
    rule: PolicyRule
    severity: Severity
}

export interface Policy {
    readonly protectedFiles: RuleSet
    readonly dangerousCommands: RuleSet
    readonly cautionCommands: RuleSet
}
