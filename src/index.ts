/**
 * shipgate library entry point
 */

export * from './types/index.js'
export { VERSION } from './version.js'

export * from './core/config/schema.js'
export * from './core/config/loader.js'
export * from './core/scanner/index.js'
export * from './core/gate/index.js'
export * from './core/reporter/index.js'
export * from './core/artifact/index.js'
export * from './core/rollout/index.js'
export * from './core/pipeline/index.js'

export { createLogger, configureLogger, type Logger, type LogLevel } from './utils/logger.js'
export { withRetry, type RetryOptions, type WaitFn } from './utils/retry.js'
