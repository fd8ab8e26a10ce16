// Refused operations and missing repositories are not errors here: the gates
// return decisions and the inspector returns sentinels.
export type ErrorKind = 'configuration_error' | 'artifact_write_failure' | 'lock_held'

export class WardenError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'WardenError'
        this.kind = kind
    }
}

export class ConfigurationError extends WardenError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'configuration_error', options)
        this.name = 'ConfigurationError'
    }
}

export class ArtifactWriteError extends WardenError {
    readonly artifact: string

    constructor(artifact: string, message: string, options?: ErrorOptions) {
        super(`${artifact}: ${message}`, 'artifact_write_failure', options)
        this.name = 'ArtifactWriteError'
        this.artifact = artifact
    }
}

export class LockHeldError extends WardenError {
    constructor(lockPath: string, options?: ErrorOptions) {
        super(`Another session close is in progress (lock: ${lockPath})`, 'lock_held', options)
        this.name = 'LockHeldError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error
        return typeof code === 'string' ? code : undefined
    }
    return undefined
}
