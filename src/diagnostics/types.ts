export type CheckId = string

export type CheckCategory = 'system' | 'network' | 'api-provider' | 'process'

/** Ordered by severity: ok < unknown < warning < critical */
export type CheckStatus = 'ok' | 'unknown' | 'warning' | 'critical'

/** One `KEY: VALUE` metric; an array of these keeps insertion order */
export type DetailEntry = readonly [key: string, value: string]

export interface CheckDefinition {
  readonly id: CheckId
  readonly category: CheckCategory
  readonly displayName: string
  readonly enabled: boolean
}

export interface CheckResult {
  readonly checkId: CheckId
  readonly displayName: string
  readonly category: CheckCategory
  readonly status: CheckStatus
  /** Short machine-ish verdict, e.g. "OVERLOADED" */
  readonly headline: string
  readonly detail: readonly DetailEntry[]
  /** ISO timestamp of completion */
  readonly timestamp: string
  readonly latencyMs: number
  readonly error?: string
}

export interface DiagnosticPass {
  /** Monotonic, in start order */
  readonly passId: number
  readonly startedAt: string
  readonly finishedAt: string
  /** One per check enabled at start, registry order */
  readonly results: readonly CheckResult[]
  readonly overallStatus: CheckStatus
}

export interface ErrorLogEntry {
  readonly checkId: CheckId
  readonly displayName: string
  readonly status: CheckStatus
  readonly lastMessage: string
  readonly firstSeen: string
  readonly lastSeen: string
  readonly occurrenceCount: number
  /** Up to 5 most recent occurrence timestamps, newest first */
  readonly recentOccurrences: readonly string[]
}

export type DiscardReason = 'preempted' | 'cancelled'

export type RunOutcome =
  | { kind: 'published'; pass: DiagnosticPass }
  | { kind: 'discarded'; passId: number; reason: DiscardReason }

export type DiagnosticEvents = {
  'pass:started': { passId: number; checkIds: CheckId[] }
  'pass:published': { pass: DiagnosticPass }
  'pass:discarded': { passId: number; reason: DiscardReason }
  'scheduler:tick': { at: string }
}
