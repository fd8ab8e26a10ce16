import type { RuleSetName } from './types.js'

/**
 * Built-in rule lists. Any of them can be replaced through `rules` in
 * .warden/config.json or a `.warden/rules/<name>.txt` file, or extended
 * through `extraRules`.
 */
export const DEFAULT_RULES: Record<RuleSetName, readonly string[]> = {
    'protected-files': [
        '/.ssh/',
        '/.aws/',
        '/.gnupg/',
        '/.git/',
        're:(^|/)\\.env(\\.[^/]*)?$',
        're:\\.(pem|key|p12|pfx)$',
        're:(^|/)id_(rsa|dsa|ecdsa|ed25519)(\\.pub)?$',
        '/.warden/config.json',
        '/.warden/rules/',
        '/.warden/sessions/',
    ],
    'dangerous-commands': [
        're:\\brm\\s+(-[a-zA-Z-]+\\s+)+(/\\*?|~/?|\\$HOME/?)(\\s|;|&|\\||$)',
        '--no-preserve-root',
        're:\\bdd\\s.*\\bof=/dev/',
        're:>\\s*/dev/(sd|hd|nvme|disk|mmcblk)',
        'mkfs',
        're:\\b(shred|wipefs|srm)\\s',
        'git reset --hard',
        'git push --force',
        'git push -f',
        're:\\bgit\\s+push\\s.*\\s(--force|-f)(\\s|$)',
        ':(){ :|:& };:',
    ],
    'caution-commands': [
        're:(^|[\\s;&|])rm\\s',
        'git clean',
        'git rebase',
        'git commit --amend',
        'git filter-branch',
        'git filter-repo',
        'git checkout -- ',
        'git restore',
        'git branch -D',
        'git stash drop',
        'git stash clear',
        're:\\bgit\\s+reset\\b',
        'chmod -R',
        'chown -R',
        'sudo ',
    ],
}
