/**
 * Time helpers
 * Thin wrapper over date-fns; report-facing formats are UTC so output does not depend on TZ
 */

import { formatDistanceToNow, parseISO, differenceInMilliseconds } from 'date-fns'

export function now(): string {
  return new Date().toISOString()
}

/** "2026-10-18T09:05:03.120Z" → "2026-10-18 09:05:03 UTC" */
export function formatUtc(isoString: string): string {
  const date = parseISO(isoString)
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`
}

/** "2026-10-18T09:05:03.120Z" → "09:05:03" */
export function formatUtcClock(isoString: string): string {
  return parseISO(isoString).toISOString().slice(11, 19)
}

/** Relative time, e.g. "3 minutes ago" */
export function formatRelative(isoString: string): string {
  return formatDistanceToNow(parseISO(isoString), { addSuffix: true })
}

export function timeDiff(start: string, end: string): number {
  return differenceInMilliseconds(parseISO(end), parseISO(start))
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  if (ms < 3600000) return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`
  return `${Math.floor(ms / 3600000)}h ${Math.floor((ms % 3600000) / 60000)}m`
}

const DURATION_MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
}

/** Parse "500ms", "5s", "1m", "2h" into milliseconds */
export function parseDuration(value: string): number {
  const match = value.trim().match(/^(\d+)(ms|s|m|h)$/)
  const amount = match?.[1]
  const unit = match?.[2]
  if (!amount || !unit) throw new Error(`Invalid duration format: ${value}`)

  const multiplier = DURATION_MULTIPLIERS[unit]
  if (multiplier === undefined) throw new Error(`Unsupported duration unit: ${unit}`)
  return parseInt(amount, 10) * multiplier
}
