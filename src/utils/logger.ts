import chalk from 'chalk'
import type { Severity } from '../types/index.js'

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel
  quiet: boolean
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

let config: LoggerConfig = {
  level: 'info',
  quiet: false
}

/**
 * Configure the logger
 */
export function configureLogger(options: Partial<LoggerConfig>): void {
  config = { ...config, ...options }
}

function shouldLog(level: LogLevel): boolean {
  if (config.quiet && level !== 'error') {
    return false
  }
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level]
}

function formatMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString()
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`
}

export function debug(message: string, ...args: unknown[]): void {
  if (shouldLog('debug')) {
    console.debug(chalk.gray(formatMessage('debug', message)), ...args)
  }
}

export function info(message: string, ...args: unknown[]): void {
  if (shouldLog('info')) {
    console.info(chalk.blue(formatMessage('info', message)), ...args)
  }
}

export function warn(message: string, ...args: unknown[]): void {
  if (shouldLog('warn')) {
    console.warn(chalk.yellow(formatMessage('warn', message)), ...args)
  }
}

export function error(message: string, ...args: unknown[]): void {
  if (shouldLog('error')) {
    console.error(chalk.red(formatMessage('error', message)), ...args)
  }
}

/**
 * Print a gate outcome line (always shown unless quiet)
 */
export function outcome(passed: boolean, message: string): void {
  if (!config.quiet) {
    console.log(passed ? chalk.green(message) : chalk.red.bold(message))
  }
}

const SEVERITY_COLORS: Record<Severity, (s: string) => string> = {
  critical: chalk.bgRed.white,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.cyan,
  info: chalk.gray
}

/**
 * Print a finding coloured by severity
 */
export function finding(severity: Severity, message: string, location: string): void {
  if (config.quiet) {
    return
  }

  const severityLabel = SEVERITY_COLORS[severity](`[${severity.toUpperCase()}]`)
  console.log(`${severityLabel} ${message} (${chalk.dim(location)})`)
}

/**
 * Named logger
 */
export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
  /** Logger for a sub-scope, e.g. one rollout plan */
  child: (scope: string) => Logger
}

/**
 * Create a named logger instance
 */
export function createLogger(name: string): Logger {
  const prefix = (msg: string) => `[${name}] ${msg}`

  return {
    debug: (message: string, ...args: unknown[]) => debug(prefix(message), ...args),
    info: (message: string, ...args: unknown[]) => info(prefix(message), ...args),
    warn: (message: string, ...args: unknown[]) => warn(prefix(message), ...args),
    error: (message: string, ...args: unknown[]) => error(prefix(message), ...args),
    child: (scope: string) => createLogger(`${name}:${scope}`)
  }
}
