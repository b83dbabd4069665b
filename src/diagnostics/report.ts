/**
 * Plain-text diagnostics report
 *
 * Pure function of a pass (plus, optionally, error log entries). The only
 * time source is the pass itself, so the same pass always renders the same text.
 */

import { formatDuration, formatUtc, formatUtcClock, timeDiff } from '../shared/formatTime.js'
import { STATUS_LABELS, worstResult } from './status.js'
import type { CheckResult, CheckStatus, DiagnosticPass, ErrorLogEntry } from './types.js'

export const REPORT_TITLE = '=== Chain Doctor Diagnostics Report ==='
export const DETAIL_SEPARATOR = ' :: '
const INDENT = '     '

export const STATUS_GLYPHS: Record<CheckStatus, string> = {
  ok: '[OK]',
  unknown: '[??]',
  warning: '[!!]',
  critical: '[XX]',
}

/** Next step per failing headline, appended to the diagnosis */
export const REMEDIATIONS: Readonly<Record<string, string>> = {
  CRITICAL_LOAD: 'Close other applications.',
  HIGH_LOAD: 'Close heavy applications.',
  LOW_DISK: 'Free up disk space.',
  OFFLINE: 'Check your network.',
  DEGRADED: 'Check DNS and proxy settings.',
  SLOW: 'Expect delays.',
  BLOCKING: 'Reconnect or disable the VPN.',
  OVERLOADED: 'Try again in a few minutes.',
  RATE_LIMITED: 'Wait a few minutes.',
  DOWN: "Check the provider's status page.",
  UNEXPECTED_STATUS: 'Check the API key and endpoint settings.',
  NOT_RUNNING: 'Start the client.',
  HIGH_MEMORY: 'Restart the client.',
  MANY_TERMINALS: 'Close unused terminals.',
  TIMEOUT: 'Try again later.',
}

export interface ReportOptions {
  /** Appends an ERROR LOG section when given */
  errorLog?: readonly ErrorLogEntry[]
}

/** Text after `DIAGNOSIS: ` */
export function diagnose(pass: DiagnosticPass): string {
  if (pass.results.length === 0) return 'No checks enabled.'
  const worst = worstResult(pass.results)
  if (!worst) return 'All systems operational.'
  const finding = `${singleLine(worst.displayName)}: ${singleLine(worst.headline)}`
  const remedy = REMEDIATIONS[worst.headline]
  return remedy ? `${finding}. ${remedy}` : finding
}

/** Provider text may carry line breaks; every report line is one record */
function singleLine(text: string): string {
  return text.replace(/\s*[\r\n]+\s*/g, ' ')
}

export function renderResult(result: CheckResult): string[] {
  const name = singleLine(result.displayName)
  const title =
    result.status === 'ok'
      ? `${STATUS_GLYPHS.ok} ${name}`
      : `${STATUS_GLYPHS[result.status]} ${name} — ${singleLine(result.headline)}`

  const lines = [title]
  if (result.detail.length > 0) {
    const pairs = result.detail.map(([key, value]) => `${singleLine(key)}: ${singleLine(value)}`)
    lines.push(INDENT + pairs.join(DETAIL_SEPARATOR))
  }
  if (result.error) {
    lines.push(`${INDENT}Error: ${singleLine(result.error)}`)
  }
  return lines
}

export function renderErrorLog(entries: readonly ErrorLogEntry[]): string[] {
  const lines = ['ERROR LOG']
  if (entries.length === 0) {
    lines.push(`${INDENT}(none)`)
    return lines
  }
  for (const entry of entries) {
    lines.push(
      `${STATUS_GLYPHS[entry.status]} ${singleLine(entry.displayName)} x${entry.occurrenceCount}` +
        ` (first ${formatUtcClock(entry.firstSeen)}, last ${formatUtcClock(entry.lastSeen)} UTC)`,
      INDENT + singleLine(entry.lastMessage),
      `${INDENT}Recent: ${entry.recentOccurrences.map(formatUtcClock).join(', ')}`
    )
  }
  return lines
}

export function renderReport(pass: DiagnosticPass, options: ReportOptions = {}): string {
  const lines = [
    REPORT_TITLE,
    `Time: ${formatUtc(pass.finishedAt)}`,
    `Duration: ${formatDuration(Math.max(0, timeDiff(pass.startedAt, pass.finishedAt)))}`,
    `Overall: ${STATUS_LABELS[pass.overallStatus]}`,
    '',
  ]

  for (const result of pass.results) {
    lines.push(...renderResult(result))
  }
  if (pass.results.length > 0) lines.push('')

  lines.push(`DIAGNOSIS: ${diagnose(pass)}`)

  if (options.errorLog) {
    lines.push('', ...renderErrorLog(options.errorLog))
  }

  return lines.join('\n')
}
