/**
 * CLI user output
 * Terminal feedback for people, no timestamps. Diagnostic logging goes
 * through shared/logger.ts instead.
 */

import chalk from 'chalk'
import { STATUS_GLYPHS } from '../diagnostics/report.js'
import type { CheckStatus } from '../diagnostics/types.js'
import type { Palette } from './theme.js'

// ============ Basic output ============

export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}

export function warn(message: string): void {
  console.warn(chalk.yellow('!'), message)
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

// ============ Structured output ============

export function header(title: string): void {
  console.log()
  console.log(chalk.bold(title))
  console.log(chalk.dim('─'.repeat(Math.min(title.length + 4, 40))))
}

export function blank(): void {
  console.log()
}

export interface ListItem {
  label: string
  value: string | number | undefined
  dim?: boolean
}

/** Aligned key/value list */
export function list(items: ListItem[], indent = 2): void {
  const prefix = ' '.repeat(indent)
  const maxLabelLen = Math.max(...items.map(i => i.label.length))

  for (const item of items) {
    const label = chalk.gray(item.label.padEnd(maxLabelLen) + ':')
    const value = String(item.value ?? '-')
    console.log(`${prefix}${label} ${item.dim ? chalk.dim(value) : value}`)
  }
}

// ============ Report ============

function isCheckStatus(value: string): value is CheckStatus {
  return value in STATUS_GLYPHS
}

function statusOfGlyph(glyph: string): CheckStatus | null {
  for (const [status, candidate] of Object.entries(STATUS_GLYPHS)) {
    if (candidate === glyph && isCheckStatus(status)) return status
  }
  return null
}

/** Colour a rendered report line by line; the text itself is left unchanged */
export function colorizeReport(report: string, palette: Palette): string {
  return report
    .split('\n')
    .map(line => {
      const glyph = line.slice(0, 4)
      const status = statusOfGlyph(glyph)
      if (status) {
        return palette.status[status](glyph) + line.slice(4)
      }
      if (line.startsWith('===') || line === 'ERROR LOG') return palette.bold(line)
      if (line.startsWith('DIAGNOSIS:')) return palette.accent(line)
      if (line.startsWith('     ')) return palette.dim(line)
      return line
    })
    .join('\n')
}
