import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

/**
 * Logs go to stderr: the hook command owns stdout for its JSON reply.
 */
export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    if (config.logLevel === 'debug' || config.logLevel === 'trace') {
        return pino({
            name: 'warden',
            level: config.logLevel,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
        })
    }
    return pino({ name: 'warden', level: config.logLevel }, pino.destination(2))
}
