import { describe, it, expect } from 'vitest'
import { CommandGate } from '../../../src/gates/command-gate.js'
import { defaultPolicy } from '../../../src/policy/loader.js'
import { DEFAULT_RULES } from '../../../src/policy/defaults.js'
import { createRuleSet } from '../../../src/policy/matcher.js'

const policy = defaultPolicy()
const gate = new CommandGate(policy.dangerousCommands, policy.cautionCommands)
const RM_CAUTION = DEFAULT_RULES['caution-commands'][0]

describe('CommandGate', () => {
    it('allows an empty or whitespace command as a no-op', () => {
        expect(gate.evaluate('')).toEqual({ allowed: true, advisories: [] })
        expect(gate.evaluate('  \t ')).toEqual({ allowed: true, advisories: [] })
    })

    it('refuses a non-string command', () => {
        expect(gate.evaluate(undefined)).toEqual({ allowed: false, reason: 'malformed command', advisories: [] })
    })

    it('allows ordinary commands without advisories', () => {
        expect(gate.evaluate('ls -la src')).toEqual({ allowed: true, advisories: [] })
        expect(gate.evaluate('git status')).toEqual({ allowed: true, advisories: [] })
    })

    it('blocks a hard reset and cites the pattern and command', () => {
        expect(gate.evaluate('git reset --hard HEAD~3')).toEqual({
            allowed: false,
            reason: 'dangerous command: matches "git reset --hard": git reset --hard HEAD~3',
            matchedRule: 'dangerous-commands#7',
            advisories: [],
        })
    })

    it('blocks recursive deletes of the filesystem root and home', () => {
        for (const command of ['rm -rf /', 'rm -rf /*', 'rm -fr ~', 'rm -r -f $HOME/', 'sudo rm -rf / ; echo done']) {
            expect(gate.evaluate(command).matchedRule).toBe('dangerous-commands#1')
        }
    })

    it('does not hard-block a recursive delete of a project directory', () => {
        const decision = gate.evaluate('rm -rf ./build')
        expect(decision.allowed).toBe(true)
        expect(decision.advisories).toEqual([`caution: matches "${RM_CAUTION}"`])
    })

    it('blocks force pushes in both spellings', () => {
        expect(gate.evaluate('git push --force origin main').matchedRule).toBe('dangerous-commands#8')
        expect(gate.evaluate('git push -f').matchedRule).toBe('dangerous-commands#9')
        expect(gate.evaluate('git push origin main --force').matchedRule).toBe('dangerous-commands#10')
    })

    it('blocks raw device writes and disk tools', () => {
        expect(gate.evaluate('dd if=/dev/zero of=/dev/sda bs=1M').matchedRule).toBe('dangerous-commands#3')
        expect(gate.evaluate('cat image > /dev/sdb').matchedRule).toBe('dangerous-commands#4')
        expect(gate.evaluate('mkfs.ext4 /dev/sdb1').matchedRule).toBe('dangerous-commands#5')
        expect(gate.evaluate('shred -u secrets.txt').matchedRule).toBe('dangerous-commands#6')
        expect(gate.evaluate(':(){ :|:& };:').matchedRule).toBe('dangerous-commands#11')
    })

    it('a hard block carries no advisories even when caution rules also match', () => {
        const decision = gate.evaluate('sudo git reset --hard')
        expect(decision.allowed).toBe(false)
        expect(decision.advisories).toEqual([])
    })

    it('allows git clean with one advisory', () => {
        expect(gate.evaluate('git clean -fd')).toEqual({
            allowed: true,
            matchedRule: 'caution-commands#2',
            advisories: ['caution: matches "git clean"'],
        })
    })

    it('produces one advisory per matching caution rule', () => {
        const decision = gate.evaluate('sudo rm -r build/')
        expect(decision.allowed).toBe(true)
        expect(decision.advisories).toEqual([`caution: matches "${RM_CAUTION}"`, 'caution: matches "sudo "'])
    })

    it('a soft reset is a caution, not a block', () => {
        expect(gate.evaluate('git reset HEAD~1').advisories).toEqual(['caution: matches "re:\\bgit\\s+reset\\b"'])
    })

    it('works with custom rule sets', () => {
        const custom = new CommandGate(
            createRuleSet('dangerous-commands', 'block', ['terraform destroy']),
            createRuleSet('caution-commands', 'caution', [])
        )
        expect(custom.evaluate('terraform destroy -auto-approve').allowed).toBe(false)
        expect(custom.evaluate('git reset --hard').allowed).toBe(true)
    })
})
