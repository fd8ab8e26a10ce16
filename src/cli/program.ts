import { Command } from 'commander'
import { checkCommand } from './commands/check.js'
import { doctorCommand } from './commands/doctor.js'
import { hookCommand } from './commands/hook.js'
import { rulesCommand } from './commands/rules.js'
import { type CloseOptions, sessionCloseCommand, sessionStartCommand } from './commands/session.js'
import type { GlobalOptions } from './commands/shared.js'
import { worklistCommand } from './commands/worklist-cmd.js'

type ExitHandler = (code: number) => void

export function createProgram(onExit: ExitHandler = (code) => { process.exitCode = code }): Command {
    const program = new Command()

    program
        .name('warden')
        .description('Guardrail gate and session archiver for AI coding agents')
        .version('0.1.0')
        .option('-C, --project <dir>', 'Project root (default: current directory)')
        .option('--debug', 'Enable debug logging')

    const globals = (): GlobalOptions => program.opts<GlobalOptions>()

    program
        .command('hook')
        .description('Evaluate one host request read as JSON from stdin; exit 0 allows, 2 refuses')
        .action(async () => onExit(await hookCommand(globals())))

    program
        .command('check <kind> <targets...>')
        .description('Evaluate file_write, file_edit or shell_command targets against the rules')
        .action(async (kind: string, targets: string[]) => onExit(await checkCommand(kind, targets, globals())))

    program
        .command('rules')
        .description('Print the loaded rule sets')
        .action(async () => onExit(await rulesCommand(globals())))

    const session = program.command('session').description('Session bookkeeping')

    session
        .command('start')
        .description('Open a session and show the outstanding worklist')
        .action(async () => onExit(await sessionStartCommand(globals())))

    session
        .command('close')
        .description('Archive the session: summary, worklist snapshot, changelog and metrics')
        .option('--since <date>', 'Start of the session window (ISO date)')
        .option('--done <ids...>', 'Mark worklist items completed')
        .option('--start <ids...>', 'Mark worklist items in progress')
        .option('--task <descriptions...>', 'Add new worklist items')
        .option('--notes <file>', 'Session notes to scan for task updates')
        .option('-y, --yes', 'Do not ask about uncommitted changes')
        .action(async (options: CloseOptions) => onExit(await sessionCloseCommand(options, globals())))

    program
        .command('worklist')
        .description('Show the worklist')
        .option('-a, --all', 'Include completed items')
        .action(async (options: { all?: boolean }) => onExit(await worklistCommand({ ...globals(), ...options })))

    program
        .command('doctor')
        .description('Environment diagnostics')
        .action(async () => onExit(await doctorCommand(globals())))

    return program
}
