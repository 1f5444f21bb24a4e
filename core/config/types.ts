/**
 * headsync Config Types
 *
 * Configuration interfaces for headsync.config.json and programmatic setup.
 */

import type { LogLevel } from '../../cli/utils/logger'

/**
 * headsync configuration object
 */
export interface HeadSyncConfig {
    /**
     * Appended verbatim to every derived title
     *
     * @example
     * defineConfig({ suffix: ' - Docs' }) // "/guide/install" → "install - Docs"
     */
    suffix?: string;

    /** Minimum level written by the logger */
    logLevel?: LogLevel;
}

/**
 * Configuration with every default filled in
 */
export interface ResolvedConfig {
    suffix: string;
    logLevel: LogLevel;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
    suffix: '',
    logLevel: 'info'
};

/**
 * Define a headsync configuration with full type safety
 */
export function defineConfig(config: HeadSyncConfig): HeadSyncConfig {
    return config;
}
