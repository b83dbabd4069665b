/**
 * Error log
 *
 * One entry per failing check, deduplicated across passes. A non-OK result
 * opens or continues its entry; an OK result clears it. Checks missing from a
 * pass (disabled) keep their entry as it is.
 */

import { isHealthy } from './status.js'
import type { CheckId, CheckResult, DiagnosticPass, ErrorLogEntry } from './types.js'

export const RECENT_OCCURRENCES_LIMIT = 5

export interface ErrorLog {
  ingest(pass: DiagnosticPass): void
  /** Most recently seen first, ties by check id */
  entries(): readonly ErrorLogEntry[]
  get(id: CheckId): ErrorLogEntry | undefined
  size(): number
  clear(): void
}

export function describeFailure(result: CheckResult): string {
  return result.error ? `${result.headline}: ${result.error}` : result.headline
}

function nextEntry(previous: ErrorLogEntry | undefined, result: CheckResult, seenAt: string): ErrorLogEntry {
  const recent = [seenAt, ...(previous?.recentOccurrences ?? [])].slice(0, RECENT_OCCURRENCES_LIMIT)
  return Object.freeze({
    checkId: result.checkId,
    displayName: result.displayName,
    status: result.status,
    lastMessage: describeFailure(result),
    firstSeen: previous?.firstSeen ?? seenAt,
    lastSeen: seenAt,
    occurrenceCount: (previous?.occurrenceCount ?? 0) + 1,
    recentOccurrences: Object.freeze(recent),
  })
}

function applyPass(entries: Map<CheckId, ErrorLogEntry>, pass: DiagnosticPass): void {
  for (const result of pass.results) {
    if (isHealthy(result.status)) {
      entries.delete(result.checkId)
    } else {
      entries.set(result.checkId, nextEntry(entries.get(result.checkId), result, pass.finishedAt))
    }
  }
}

function sortEntries(entries: Iterable<ErrorLogEntry>): readonly ErrorLogEntry[] {
  const sorted = [...entries].sort((a, b) => {
    if (a.lastSeen !== b.lastSeen) return a.lastSeen < b.lastSeen ? 1 : -1
    return a.checkId < b.checkId ? -1 : a.checkId > b.checkId ? 1 : 0
  })
  return Object.freeze(sorted)
}

/** Fold a sequence of passes into the entries an error log would hold after ingesting them */
export function reduceErrorLog(passes: Iterable<DiagnosticPass>): readonly ErrorLogEntry[] {
  const entries = new Map<CheckId, ErrorLogEntry>()
  for (const pass of passes) {
    applyPass(entries, pass)
  }
  return sortEntries(entries.values())
}

export function createErrorLog(): ErrorLog {
  const entries = new Map<CheckId, ErrorLogEntry>()

  return {
    ingest(pass) {
      applyPass(entries, pass)
    },
    entries() {
      return sortEntries(entries.values())
    },
    get(id) {
      return entries.get(id)
    },
    size() {
      return entries.size
    },
    clear() {
      entries.clear()
    },
  }
}
