/**
 * headsync - Logger Utility
 *
 * Colored console output, shared by the CLI and the head coordinator.
 * Scoped loggers prefix every line with `[headsync:<scope>]`.
 */

import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

const levelRank: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
}

export interface Logger {
    readonly scope: string
    readonly level: LogLevel
    debug(message: string, ...details: unknown[]): void
    info(message: string, ...details: unknown[]): void
    warn(message: string, ...details: unknown[]): void
    error(message: string, ...details: unknown[]): void
    child(scope: string): Logger
}

export interface LoggerOptions {
    scope?: string
    level?: LogLevel
}

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value)
}

/**
 * Create a scoped logger
 *
 * @example
 * const logger = createLogger({ scope: 'head', level: 'debug' })
 * logger.info('title set') // [headsync:head] title set
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const scope = options.scope ?? 'core'
    const level = options.level ?? 'info'
    const prefix = `[headsync:${scope}]`

    const enabled = (at: LogLevel) => levelRank[at] >= levelRank[level]

    return {
        scope,
        level,
        debug(message, ...details) {
            if (enabled('debug')) console.log(`${pc.dim(prefix)} ${pc.dim(message)}`, ...details)
        },
        info(message, ...details) {
            if (enabled('info')) console.log(`${pc.cyan(prefix)} ${message}`, ...details)
        },
        warn(message, ...details) {
            if (enabled('warn')) console.error(`${pc.yellow(prefix)} ${pc.yellow('⚠')} ${message}`, ...details)
        },
        error(message, ...details) {
            if (enabled('error')) console.error(`${pc.red(prefix)} ${pc.red('✗')} ${message}`, ...details)
        },
        child(childScope) {
            return createLogger({ scope: `${scope}:${childScope}`, level })
        }
    }
}

// CLI output helpers

export function success(message: string): void {
    console.log(`${pc.green('✓')} ${message}`)
}

export function error(message: string): void {
    console.error(`${pc.red('✗')} ${message}`)
}

export function header(title: string): void {
    console.log(`\n${pc.bold(pc.cyan(title))}\n`)
}
