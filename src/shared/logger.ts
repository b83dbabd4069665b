/**
 * Scoped logging
 *
 * Lines carry a UTC clock so they line up with report timestamps. In
 * background mode (non-TTY, or `watch` redrawing the report) each line also
 * carries the logger scope, e.g. `[scheduler]`.
 *
 * Level comes from LOG_LEVEL / DEBUG=1 / SILENT=1, silent under NODE_ENV=test.
 */

import chalk from 'chalk'
import { formatUtcClock, now } from './formatTime.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type LogMode = 'foreground' | 'background'

type ActiveLevel = Exclude<LogLevel, 'silent'>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_STYLE: Record<ActiveLevel, { label: string; paint: (s: string) => string; sink: 'log' | 'warn' | 'error' }> = {
  debug: { label: 'DBG', paint: chalk.gray, sink: 'log' },
  info: { label: 'INF', paint: chalk.blue, sink: 'log' },
  warn: { label: 'WRN', paint: chalk.yellow, sink: 'warn' },
  error: { label: 'ERR', paint: chalk.red, sink: 'error' },
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

// ============ Global state ============

function levelFromEnv(): LogLevel {
  if (process.env.NODE_ENV === 'test' || process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const fromEnv = process.env.LOG_LEVEL
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info'
}

function modeFromEnv(): LogMode {
  if (process.env.CHAIN_DOCTOR_BACKGROUND === '1') return 'background'
  return process.stdout.isTTY ? 'foreground' : 'background'
}

let currentLevel: LogLevel = levelFromEnv()
let currentMode: LogMode = modeFromEnv()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function setLogMode(mode: LogMode): void {
  currentMode = mode
}

function formatLine(level: ActiveLevel, scope: string, message: string): string {
  const { label, paint } = LEVEL_STYLE[level]
  const head = `${chalk.dim(formatUtcClock(now()))} ${paint(label)}`
  if (currentMode === 'foreground' || !scope) return `${head} ${message}`
  return `${head} ${chalk.cyan(`[${scope}]`)} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope: string = ''): Logger {
  const write =
    (level: ActiveLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return
      console[LEVEL_STYLE[level].sink](formatLine(level, scope, message), ...args)
    }

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  }
}

// ============ Contextual error logging ============

export interface ErrorContext {
  checkId?: string
  passId?: number
  [key: string]: unknown
}

/**
 * Log an error with its message, the top of its stack and any defined
 * context fields.
 *
 * @example
 * logError(logger, 'Scheduled pass failed', error, { passId })
 */
export function logError(logger: Logger, message: string, error: Error | string, context: ErrorContext = {}): void {
  const data: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(context)) {
    if (value !== undefined) data[key] = value
  }

  if (error instanceof Error && error.stack) {
    data.stack = error.stack.split('\n').slice(0, 6).join('\n')
  }

  const line = `${message}: ${error instanceof Error ? error.message : error}`
  if (Object.keys(data).length > 0) {
    logger.error(line, data)
  } else {
    logger.error(line)
  }
}
