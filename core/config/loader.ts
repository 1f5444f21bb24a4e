/**
 * headsync Config Loader
 *
 * Validates configuration from files, the environment and CLI flags.
 * Precedence when merged: defaults < file < environment < flags.
 */

import fs from 'fs'
import { isLogLevel, LOG_LEVELS } from '../../cli/utils/logger'
import { ConfigError } from '../errors/headError'
import { DEFAULT_CONFIG, type HeadSyncConfig, type ResolvedConfig } from './types'

export const ENV_SUFFIX = 'HEADSYNC_TITLE_SUFFIX'
export const ENV_LOG_LEVEL = 'HEADSYNC_LOG_LEVEL'

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate a partial configuration
 *
 * @throws ConfigError naming the offending key
 */
export function validateConfig(input: unknown): HeadSyncConfig {
    if (!isRecord(input)) {
        throw new ConfigError('<root>', 'expected an object')
    }

    const config: HeadSyncConfig = {}

    if (input.suffix !== undefined) {
        if (typeof input.suffix !== 'string') {
            throw new ConfigError('suffix', 'expected a string')
        }
        config.suffix = input.suffix
    }

    if (input.logLevel !== undefined) {
        if (!isLogLevel(input.logLevel)) {
            throw new ConfigError('logLevel', `expected one of ${LOG_LEVELS.join(', ')}`)
        }
        config.logLevel = input.logLevel
    }

    return config
}

/**
 * Validate and merge configuration layers over the defaults, later layers winning
 */
export function resolveConfig(...layers: unknown[]): ResolvedConfig {
    const resolved: ResolvedConfig = { ...DEFAULT_CONFIG }

    for (const layer of layers) {
        const config = validateConfig(layer)
        if (config.suffix !== undefined) resolved.suffix = config.suffix
        if (config.logLevel !== undefined) resolved.logLevel = config.logLevel
    }

    return resolved
}

/**
 * Read a JSON config file
 *
 * @throws ConfigError when the file is not valid JSON or fails validation
 */
export function loadConfigFile(filePath: string): HeadSyncConfig {
    const source = fs.readFileSync(filePath, 'utf-8')

    let parsed: unknown
    try {
        parsed = JSON.parse(source)
    } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err)
        throw new ConfigError('<root>', `${filePath} is not valid JSON (${message})`)
    }

    return validateConfig(parsed)
}

/**
 * Read configuration from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): HeadSyncConfig {
    const config: Record<string, unknown> = {}

    if (env[ENV_SUFFIX] !== undefined) config.suffix = env[ENV_SUFFIX]
    if (env[ENV_LOG_LEVEL] !== undefined) config.logLevel = env[ENV_LOG_LEVEL]

    return validateConfig(config)
}
