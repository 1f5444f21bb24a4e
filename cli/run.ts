/**
 * headsync CLI - Runner
 *
 * Dispatches argv to a command and returns the process exit code.
 */

import { getCommand, showHelp } from './commands/index'
import { parseArgs } from './utils/args'
import * as logger from './utils/logger'

export async function run(argv: string[]): Promise<number> {
    const { command: commandName, positionals, options } = parseArgs(argv)

    if (!commandName || options.help !== undefined || argv.includes('-h')) {
        showHelp()
        return 0
    }

    const command = getCommand(commandName)

    if (!command) {
        logger.error(`Unknown command: ${commandName}`)
        showHelp()
        return 1
    }

    try {
        await command.run(positionals, options)
        return 0
    } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err)
        logger.error(message)
        return 1
    }
}
