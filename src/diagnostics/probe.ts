/**
 * Probe abstraction
 *
 * Every check is a Probe: execute(ctx) always resolves to a CheckResult.
 * Category implementations only describe the happy path through `run`;
 * defineProbe adds timing, the timeout race and failure classification.
 */

import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import type { CheckCategory, CheckId, CheckResult, CheckStatus, DetailEntry } from './types.js'

export interface ProbeContext {
  timeoutMs: number
  /** Aborted on timeout or when the pass is preempted; check it at I/O points */
  signal: AbortSignal
}

export interface ProbeOutcome {
  status: CheckStatus
  headline: string
  detail?: readonly DetailEntry[]
  error?: string
}

export interface ProbeMeta {
  readonly id: CheckId
  readonly category: CheckCategory
  readonly displayName: string
}

export interface Probe extends ProbeMeta {
  execute(ctx: ProbeContext): Promise<CheckResult>
}

export interface ProbeSpec extends ProbeMeta {
  run(ctx: ProbeContext): Promise<ProbeOutcome>
}

/** Network and API probes read a timeout as degraded service, not a tool fault */
export const TIMEOUT_STATUS: Record<CheckCategory, CheckStatus> = {
  system: 'unknown',
  process: 'unknown',
  network: 'critical',
  'api-provider': 'critical',
}

// ============ Result construction ============

export function makeResult(
  meta: ProbeMeta,
  outcome: ProbeOutcome,
  latencyMs: number,
  timestamp: string = new Date().toISOString()
): CheckResult {
  const result: CheckResult = {
    checkId: meta.id,
    displayName: meta.displayName,
    category: meta.category,
    status: outcome.status,
    headline: outcome.headline,
    detail: Object.freeze((outcome.detail ?? []).map(([k, v]) => Object.freeze([k, v] as const))),
    timestamp,
    latencyMs,
    ...(outcome.error !== undefined ? { error: outcome.error } : {}),
  }
  return Object.freeze(result)
}

export function timeoutResult(meta: ProbeMeta, timeoutMs: number, latencyMs: number): CheckResult {
  return makeResult(
    meta,
    {
      status: TIMEOUT_STATUS[meta.category],
      headline: 'TIMEOUT',
      error: `timed out after ${timeoutMs}ms`,
    },
    latencyMs
  )
}

/**
 * Map a failure onto a result:
 * transport failures are the service being down, everything else means
 * the probe could not run at all.
 */
export function failureResult(meta: ProbeMeta, error: unknown, latencyMs: number): CheckResult {
  const appError = AppError.fromError(error)

  if (appError.code === 'TRANSPORT_FAILURE') {
    return makeResult(
      meta,
      { status: 'critical', headline: 'DOWN', error: appError.message },
      latencyMs
    )
  }
  if (appError.code === 'PROBE_TIMEOUT') {
    return makeResult(
      meta,
      { status: TIMEOUT_STATUS[meta.category], headline: 'TIMEOUT', error: appError.message },
      latencyMs
    )
  }
  return makeResult(
    meta,
    { status: 'unknown', headline: 'UNAVAILABLE', error: getErrorMessage(error) },
    latencyMs
  )
}

// ============ defineProbe ============

export function defineProbe(spec: ProbeSpec): Probe {
  const meta: ProbeMeta = {
    id: spec.id,
    category: spec.category,
    displayName: spec.displayName,
  }

  return {
    ...meta,
    async execute(ctx: ProbeContext): Promise<CheckResult> {
      const startedAt = Date.now()
      const controller = new AbortController()

      const forwardAbort = () => controller.abort(ctx.signal.reason)
      if (ctx.signal.aborted) {
        forwardAbort()
      } else {
        ctx.signal.addEventListener('abort', forwardAbort, { once: true })
      }

      const timer = setTimeout(
        () => controller.abort(AppError.probeTimeout(spec.id, ctx.timeoutMs)),
        ctx.timeoutMs
      )

      let resolveAborted: (value: 'aborted') => void = () => {}
      const aborted = new Promise<'aborted'>(resolve => {
        resolveAborted = resolve
      })
      const onAbort = () => resolveAborted('aborted')
      if (controller.signal.aborted) onAbort()
      else controller.signal.addEventListener('abort', onAbort, { once: true })

      try {
        const outcome = await Promise.race([
          spec.run({ timeoutMs: ctx.timeoutMs, signal: controller.signal }),
          aborted,
        ])
        const latencyMs = Date.now() - startedAt

        if (outcome === 'aborted') {
          return timeoutResult(meta, ctx.timeoutMs, latencyMs)
        }
        return makeResult(meta, outcome, latencyMs)
      } catch (error) {
        const latencyMs = Date.now() - startedAt
        if (controller.signal.aborted) {
          return timeoutResult(meta, ctx.timeoutMs, latencyMs)
        }
        return failureResult(meta, error, latencyMs)
      } finally {
        clearTimeout(timer)
        ctx.signal.removeEventListener('abort', forwardAbort)
        controller.signal.removeEventListener('abort', onAbort)
      }
    },
  }
}
