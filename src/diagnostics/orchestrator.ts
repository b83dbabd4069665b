/**
 * Orchestrator: runs one diagnostic pass
 *
 * 1. claim the exclusive run slot (a running pass is preempted)
 * 2. snapshot the enabled checks
 * 3. fan out one probe invocation per check through a limiter
 * 4. wait for all / run deadline / preemption, whichever comes first
 * 5. seal and publish; a discarded pass never publishes
 */

import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { fromPromise } from '../shared/result.js'
import { createExclusiveSlot, createLimiter, type SlotClaim } from '../shared/concurrency.js'
import type { EventBus } from '../shared/eventBus.js'
import { aggregateStatus, STATUS_LABELS } from './status.js'
import { createPassCell, type PassCell } from './passCell.js'
import { failureResult, makeResult, timeoutResult, type Probe, type ProbeMeta } from './probe.js'
import type { CheckRegistry } from './registry.js'
import type {
  CheckDefinition,
  CheckId,
  CheckResult,
  DiagnosticEvents,
  DiagnosticPass,
  DiscardReason,
  RunOutcome,
} from './types.js'

const logger = createLogger('orchestrator')

export const DEFAULT_PROBE_TIMEOUT_MS = 5000
export const DEFAULT_GRACE_MS = 250
export const DEFAULT_MAX_CONCURRENCY = 8
/** Run deadline as a multiple of the per-probe timeout */
export const RUN_DEADLINE_FACTOR = 3

export interface OrchestratorTimings {
  probeTimeoutMs: number
  runDeadlineMs: number
  /** How long to wait past the probe timeout before abandoning the invocation */
  graceMs: number
  maxConcurrency: number
}

export interface OrchestratorOptions extends Partial<OrchestratorTimings> {
  registry: CheckRegistry
  probes: Iterable<Probe>
  cell?: PassCell
  events?: EventBus<DiagnosticEvents>
  now?: () => Date
}

export interface Orchestrator {
  run(): Promise<RunOutcome>
  /** Discard the in-flight pass, if any */
  cancel(): boolean
  isRunning(): boolean
  currentPass(): DiagnosticPass | null
  /** Takes effect on the next run */
  configure(timings: Partial<OrchestratorTimings>): void
  timings(): OrchestratorTimings
  readonly cell: PassCell
}

function resolveTimings(
  base: OrchestratorTimings | null,
  patch: Partial<OrchestratorTimings>
): OrchestratorTimings {
  const probeTimeoutMs = patch.probeTimeoutMs ?? base?.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS
  const explicitDeadline = patch.runDeadlineMs ?? (patch.probeTimeoutMs === undefined ? base?.runDeadlineMs : undefined)
  return {
    probeTimeoutMs,
    runDeadlineMs: explicitDeadline ?? probeTimeoutMs * RUN_DEADLINE_FACTOR,
    graceMs: patch.graceMs ?? base?.graceMs ?? DEFAULT_GRACE_MS,
    maxConcurrency: patch.maxConcurrency ?? base?.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY,
  }
}

function discardReason(claim: SlotClaim): DiscardReason {
  return getErrorMessage(claim.signal.reason) === 'cancelled' ? 'cancelled' : 'preempted'
}

export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  const { registry, events } = options
  const now = options.now ?? (() => new Date())
  const cell = options.cell ?? createPassCell()
  const slot = createExclusiveSlot()

  const probes = new Map<CheckId, Probe>()
  for (const probe of options.probes) {
    probes.set(probe.id, probe)
  }

  let timings = resolveTimings(null, options)

  /** One probe invocation, bounded by probeTimeoutMs + graceMs no matter what the probe does */
  async function invoke(def: CheckDefinition, runSignal: AbortSignal, t: OrchestratorTimings): Promise<CheckResult> {
    const meta: ProbeMeta = def
    const probe = probes.get(def.id)
    if (!probe) {
      return makeResult(
        meta,
        { status: 'unknown', headline: 'UNAVAILABLE', error: `no probe registered for ${def.id}` },
        0
      )
    }

    const startedAt = Date.now()
    if (runSignal.aborted) {
      return timeoutResult(meta, t.probeTimeoutMs, 0)
    }

    const controller = new AbortController()
    const forwardAbort = () => controller.abort(runSignal.reason)
    runSignal.addEventListener('abort', forwardAbort, { once: true })

    const timeoutTimer = setTimeout(() => controller.abort(), t.probeTimeoutMs)
    let abandonTimer: ReturnType<typeof setTimeout> | undefined
    const abandoned = new Promise<CheckResult>(resolve => {
      abandonTimer = setTimeout(() => {
        logger.warn(`Probe ${def.id} ignored cancellation, abandoning it`)
        resolve(timeoutResult(meta, t.probeTimeoutMs, Date.now() - startedAt))
      }, t.probeTimeoutMs + t.graceMs)
    })

    const execution = fromPromise(
      probe.execute({ timeoutMs: t.probeTimeoutMs, signal: controller.signal })
    ).then(result =>
      result.ok ? result.value : failureResult(meta, result.error, Date.now() - startedAt)
    )

    try {
      return await Promise.race([execution, abandoned])
    } finally {
      clearTimeout(timeoutTimer)
      clearTimeout(abandonTimer)
      runSignal.removeEventListener('abort', forwardAbort)
    }
  }

  async function run(): Promise<RunOutcome> {
    const claim = slot.claim()
    const passId = claim.id
    const t = timings
    const checks = registry.listEnabled()
    const startedAt = now().toISOString()

    logger.debug(`Pass ${passId} started with ${checks.length} check(s)`)
    await events?.emit('pass:started', { passId, checkIds: checks.map(c => c.id) })

    // Aborted on preemption, cancellation or the run deadline
    const runController = new AbortController()
    const forwardClaimAbort = () => runController.abort(claim.signal.reason)
    if (claim.signal.aborted) forwardClaimAbort()
    else claim.signal.addEventListener('abort', forwardClaimAbort, { once: true })

    const limiter = createLimiter(t.maxConcurrency)
    const settled: Array<CheckResult | undefined> = checks.map(() => undefined)
    const invocations = checks.map((def, index) =>
      limiter
        .run(() => invoke(def, runController.signal, t))
        .then(result => {
          settled[index] = result
        })
    )

    let deadlineTimer: ReturnType<typeof setTimeout> | undefined
    const deadline = new Promise<'deadline'>(resolve => {
      deadlineTimer = setTimeout(() => resolve('deadline'), t.runDeadlineMs)
    })
    const discarded = new Promise<'discarded'>(resolve => {
      if (runController.signal.aborted) resolve('discarded')
      else runController.signal.addEventListener('abort', () => resolve('discarded'), { once: true })
    })

    try {
      const winner = await Promise.race([
        Promise.all(invocations).then(() => 'settled' as const),
        deadline,
        discarded,
      ])

      if (!slot.holds(claim)) {
        const reason = discardReason(claim)
        logger.debug(`Pass ${passId} discarded (${reason})`)
        await events?.emit('pass:discarded', { passId, reason })
        return { kind: 'discarded', passId, reason }
      }

      if (winner === 'deadline') {
        const outstanding = settled.filter(r => r === undefined).length
        logger.warn(`Pass ${passId} hit its ${t.runDeadlineMs}ms deadline with ${outstanding} probe(s) outstanding`)
        runController.abort(new Error('run deadline'))
      }

      const results = checks.map(
        (def, index) =>
          settled[index] ??
          makeResult(def, { status: 'unknown', headline: 'TIMEOUT', error: 'timed out' }, t.runDeadlineMs)
      )

      const pass: DiagnosticPass = Object.freeze({
        passId,
        startedAt,
        finishedAt: now().toISOString(),
        results: Object.freeze(results),
        overallStatus: aggregateStatus(results),
      })

      slot.release(claim)
      cell.publish(pass)
      logger.info(`Pass ${passId} sealed: ${STATUS_LABELS[pass.overallStatus]} (${results.length} check(s))`)
      await events?.emit('pass:published', { pass })
      return { kind: 'published', pass }
    } finally {
      clearTimeout(deadlineTimer)
      claim.signal.removeEventListener('abort', forwardClaimAbort)
      slot.release(claim)
    }
  }

  return {
    run,
    cancel() {
      return slot.cancel('cancelled')
    },
    isRunning() {
      return slot.isHeld()
    },
    currentPass() {
      return cell.current()
    },
    configure(patch) {
      timings = resolveTimings(timings, patch)
    },
    timings() {
      return timings
    },
    cell,
  }
}
