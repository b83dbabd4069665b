import type { CheckResult, CheckStatus } from './types.js'

export const STATUS_SEVERITY: Record<CheckStatus, number> = {
  ok: 0,
  unknown: 1,
  warning: 2,
  critical: 3,
}

export const STATUS_LABELS: Record<CheckStatus, string> = {
  ok: 'OK',
  unknown: 'UNKNOWN',
  warning: 'WARNING',
  critical: 'CRITICAL',
}

export function compareStatus(a: CheckStatus, b: CheckStatus): number {
  return STATUS_SEVERITY[a] - STATUS_SEVERITY[b]
}

export function isHealthy(status: CheckStatus): boolean {
  return status === 'ok'
}

/** Highest severity; an empty set is `unknown` */
export function maxStatus(statuses: Iterable<CheckStatus>): CheckStatus {
  let worst: CheckStatus | null = null
  for (const status of statuses) {
    if (worst === null || compareStatus(status, worst) > 0) {
      worst = status
    }
  }
  return worst ?? 'unknown'
}

export function aggregateStatus(results: readonly CheckResult[]): CheckStatus {
  return maxStatus(results.map(r => r.status))
}

/**
 * First result with the highest non-OK severity, in the given order.
 * Null when every result is OK.
 */
export function worstResult(results: readonly CheckResult[]): CheckResult | null {
  let worst: CheckResult | null = null
  for (const result of results) {
    if (isHealthy(result.status)) continue
    if (worst === null || compareStatus(result.status, worst.status) > 0) {
      worst = result
    }
  }
  return worst
}
