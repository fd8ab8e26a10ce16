import { loadConfig } from '../../config/loader.js'
import type { Config } from '../../config/schema.js'
import { createContainer, type Container } from '../../core/container.js'
import { NodeFileSystem } from '../../core/fs.js'

export interface GlobalOptions {
    debug?: boolean
    project?: string
}

export async function bootstrap(options: GlobalOptions, cliFlags: Partial<Config> = {}): Promise<Container> {
    const fs = new NodeFileSystem()
    const config = await loadConfig({
        fs,
        projectDir: options.project ?? process.cwd(),
        cliFlags: { ...cliFlags, logLevel: options.debug ? 'debug' : cliFlags.logLevel },
    })
    return createContainer(config, { fs })
}
