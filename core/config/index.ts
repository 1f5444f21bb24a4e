/**
 * headsync Config
 *
 * Config types and loaders, re-exported from the package root
 */

export { defineConfig, DEFAULT_CONFIG } from './types';
export type { HeadSyncConfig, ResolvedConfig } from './types';
export {
    validateConfig,
    resolveConfig,
    loadConfigFile,
    configFromEnv,
    ENV_SUFFIX,
    ENV_LOG_LEVEL
} from './loader';
