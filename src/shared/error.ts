/**
 * Unified error type
 * Codes, categories and a suggested fix per error
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

// ============ Categories ============

export type ErrorCategory =
  | 'CONFIG'
  | 'PROBE'
  | 'NETWORK'
  | 'PERMISSION'
  | 'TIMEOUT'
  | 'RUNTIME'
  | 'UNKNOWN'

export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'PROBE_TIMEOUT'
  | 'PROBE_UNAVAILABLE'
  | 'TRANSPORT_FAILURE'
  | 'INVARIANT_VIOLATION'
  | 'CLIPBOARD_UNAVAILABLE'
  | 'NO_PASS'
  | 'UNKNOWN'

// ============ AppError ============

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /** Terminal rendering */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(this.category)}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ Factories ============

  static configNotFound(path: string): AppError {
    return new AppError(
      'CONFIG_NOT_FOUND',
      `Config not found: ${path}`,
      'CONFIG',
      undefined,
      'Check the config file path'
    )
  }

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      'Run `chain-doctor config show` to see the effective settings'
    )
  }

  /** Unknown ids are a settings problem: CONFIG_INVALID */
  static unknownCheck(id: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Unknown check: ${id}`,
      'CONFIG',
      undefined,
      'List known checks: chain-doctor checks list'
    )
  }

  static probeTimeout(checkId: string, timeoutMs: number): AppError {
    return new AppError('PROBE_TIMEOUT', `${checkId} timed out after ${timeoutMs}ms`, 'TIMEOUT')
  }

  static probeUnavailable(reason: string, cause?: unknown): AppError {
    return new AppError('PROBE_UNAVAILABLE', reason, 'PROBE', cause)
  }

  static transport(message: string, cause?: unknown): AppError {
    return new AppError(
      'TRANSPORT_FAILURE',
      message,
      'NETWORK',
      cause,
      'Check the network connection and VPN/proxy settings'
    )
  }

  static invariant(message: string): AppError {
    return new AppError('INVARIANT_VIOLATION', message, 'RUNTIME')
  }

  static clipboardUnavailable(reason: string): AppError {
    return new AppError(
      'CLIPBOARD_UNAVAILABLE',
      reason,
      'RUNTIME',
      undefined,
      'Install pbcopy, wl-copy or xclip, or pipe `chain-doctor run` instead'
    )
  }

  static noPass(): AppError {
    return new AppError(
      'NO_PASS',
      'No diagnostic pass has completed yet',
      'RUNTIME',
      undefined,
      'Run the checks first: chain-doctor run'
    )
  }

  /**
   * Classify a thrown value by message pattern.
   * AppError instances pass through untouched.
   */
  static fromError(error: unknown): AppError {
    if (error instanceof AppError) return error

    const message = getErrorMessage(error)
    const causeMessage =
      error instanceof Error && error.cause !== undefined ? getErrorMessage(error.cause) : ''
    const haystack = `${message} ${causeMessage}`

    for (const pattern of errorPatterns) {
      if (pattern.pattern.test(haystack)) {
        return new AppError(pattern.code, message, pattern.category, error, pattern.suggestion)
      }
    }

    return new AppError('UNKNOWN', message, 'UNKNOWN', error)
  }
}

// ============ Pattern matching ============

interface ErrorPattern {
  pattern: RegExp
  category: ErrorCategory
  code: ErrorCode
  suggestion?: string
}

const errorPatterns: ErrorPattern[] = [
  {
    pattern: /timeout|timed out|ETIMEDOUT|aborted/i,
    category: 'TIMEOUT',
    code: 'PROBE_TIMEOUT',
    suggestion: 'Raise probe_timeout in the settings file',
  },
  {
    pattern: /ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN|EHOSTUNREACH|ENETUNREACH|fetch failed|connection refused/i,
    category: 'NETWORK',
    code: 'TRANSPORT_FAILURE',
    suggestion: 'Check the network connection and VPN/proxy settings',
  },
  {
    pattern: /EACCES|EPERM|permission denied/i,
    category: 'PERMISSION',
    code: 'PROBE_UNAVAILABLE',
    suggestion: 'Run with a user allowed to query this resource',
  },
  {
    pattern: /ENOENT|not found|command not found/i,
    category: 'PROBE',
    code: 'PROBE_UNAVAILABLE',
    suggestion: 'Install the missing tool or disable the check',
  },
]

// ============ Output ============

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  PROBE: chalk.yellow,
  NETWORK: chalk.red,
  PERMISSION: chalk.red,
  TIMEOUT: chalk.magenta,
  RUNTIME: chalk.red,
  UNKNOWN: chalk.gray,
}

export function printError(error: unknown): void {
  console.error(AppError.fromError(error).format())
}
