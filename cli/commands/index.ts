/**
 * headsync CLI - Command Registry
 *
 * Central registry for all CLI commands
 */

import { configFromEnv, loadConfigFile, resolveConfig } from '../../core/config/loader'
import type { HeadSyncConfig, ResolvedConfig } from '../../core/config/types'
import { titleForLocation } from '../../head/title'
import { hasChanged } from '../../router/location'
import { simulate } from './simulate'
import * as logger from '../utils/logger'

export interface Command {
    name: string
    description: string
    usage: string
    run: (args: string[], options: Record<string, string>) => Promise<void>
}

/**
 * Merge config file, environment and flags
 */
export function configFromOptions(options: Record<string, string>, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
    const file: HeadSyncConfig = options.config ? loadConfigFile(options.config) : {}

    const flags: Record<string, unknown> = {}
    if (options.suffix !== undefined) flags.suffix = options.suffix
    if (options['log-level'] !== undefined) flags.logLevel = options['log-level']

    return resolveConfig(file, configFromEnv(env), flags)
}

export const commands: Command[] = [
    {
        name: 'simulate',
        description: 'Replay navigations against an in-memory document head',
        usage: 'headsync simulate <location>... [--suffix <text>] [--head <markup>] [--config <file>]',
        async run(args, options) {
            if (args.length === 0) {
                throw new Error('At least one location is required')
            }

            const config = configFromOptions(options)
            const result = await simulate(args, {
                suffix: config.suffix,
                head: options.head,
                logLevel: config.logLevel
            })

            logger.header('Bridge calls')
            result.calls.forEach((call, index) => {
                console.log(`  ${String(index + 1).padStart(2)}. ${call}`)
            })

            logger.header('Head')
            console.log(`  ${result.head}`)
            logger.success(`Final title: ${result.title ?? '(none)'}`)
        }
    },
    {
        name: 'title',
        description: 'Print the title derived from a location',
        usage: 'headsync title <location> [--suffix <text>]',
        async run(args, options) {
            const location = args[0]
            if (location === undefined) {
                throw new Error('Location required')
            }
            const config = configFromOptions(options)
            console.log(titleForLocation(location, config.suffix))
        }
    },
    {
        name: 'compare',
        description: 'Check whether two locations differ in scheme, host or path',
        usage: 'headsync compare <previous> <next>',
        async run(args) {
            const [previous, next] = args
            if (previous === undefined || next === undefined) {
                throw new Error('Two locations required')
            }
            console.log(hasChanged(previous, next) ? 'changed' : 'unchanged')
        }
    }
]

export function getCommand(name: string): Command | undefined {
    return commands.find(c => c.name === name)
}

export function showHelp(): void {
    logger.header('headsync')
    console.log('Usage: headsync <command> [options]\n')
    console.log('Commands:')

    for (const cmd of commands) {
        console.log(`  ${cmd.name.padEnd(12)} ${cmd.description}`)
    }

    console.log('\nUsage:')
    for (const cmd of commands) {
        console.log(`  ${cmd.usage}`)
    }

    console.log('\nOptions take the next argument as their value.')
    console.log('Use --key=value when the value starts with -- or a flag comes before a location.')
}
