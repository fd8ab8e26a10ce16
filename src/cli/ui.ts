import pc from 'picocolors'
import type { GateDecision } from '../core/types.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatDecision(target: string, decision: GateDecision): string {
    if (!decision.allowed) {
        return `${colors.error('✗')} ${target}\n    ${colors.dim(decision.reason ?? 'blocked')}`
    }
    if (decision.advisories.length > 0) {
        const notes = decision.advisories.map((a) => `    ${colors.warn(a)}`).join('\n')
        return `${colors.warn('!')} ${target}\n${notes}`
    }
    return `${colors.success('✓')} ${target}`
}
