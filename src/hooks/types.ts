export type HookName = 'GateBlocked' | 'SessionEnd'

export interface HookResult {
    hookName: HookName
    success: boolean
    output?: string
    error?: string
}
