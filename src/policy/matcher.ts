import { ConfigurationError, errorMessage } from '../core/errors.js'
import type { MatchResult, PolicyRule, RuleSet, RuleSetName, Severity, TextMatcher } from './types.js'

/** Patterns written as `re:<body>` are regular expressions; anything else is a literal substring. */
export const REGEX_PREFIX = 're:'

export function compilePattern(source: string, location: string): TextMatcher {
    if (source.length === 0) {
        throw new ConfigurationError(`${location}: empty pattern would match everything`)
    }
    if (!source.startsWith(REGEX_PREFIX)) {
        return { kind: 'substring', text: source }
    }

    const body = source.slice(REGEX_PREFIX.length)
    if (body.length === 0) {
        throw new ConfigurationError(`${location}: empty regular expression`)
    }
    try {
        return { kind: 'regex', regex: new RegExp(body) }
    } catch (error) {
        throw new ConfigurationError(`${location}: invalid regular expression /${body}/: ${errorMessage(error)}`, {
            cause: error,
        })
    }
}

export function createRuleSet(name: RuleSetName, severity: Severity, sources: readonly string[]): RuleSet {
    const rules: PolicyRule[] = sources.map((source, index) => {
        const id = `${name}#${index + 1}`
        return Object.freeze({ id, source, severity, pattern: compilePattern(source, id) })
    })
    return Object.freeze({ name, severity, rules: Object.freeze(rules) })
}

function testPattern(pattern: TextMatcher, candidate: string): boolean {
    switch (pattern.kind) {
        case 'substring':
            return candidate.includes(pattern.text)
        case 'regex':
            return pattern.regex.test(candidate)
    }
}

export function matches(candidate: string, ruleSet: RuleSet): MatchResult | null {
    for (const rule of ruleSet.rules) {
        if (testPattern(rule.pattern, candidate)) return { rule, severity: rule.severity }
    }
    return null
}

export function matchAll(candidate: string, ruleSet: RuleSet): MatchResult[] {
    return ruleSet.rules
        .filter((rule) => testPattern(rule.pattern, candidate))
        .map((rule) => ({ rule, severity: rule.severity }))
}
