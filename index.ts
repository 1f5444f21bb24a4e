/**
 * headsync
 *
 * Keeps a single-page application's document head in step with navigation,
 * with every bridge call serialized through one task queue.
 */

export * from './head/index'
export * from './router/index'
export * from './core/queue/index'
export * from './core/lifecycle/index'
export * from './core/config/index'
export * from './core/errors/headError'
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from './cli/utils/logger'
