/**
 * Diagnostic service
 *
 * The one object a presentation layer talks to. Wires registry, orchestrator,
 * error log and scheduler together; publications feed the error log before
 * any listener sees them.
 */

import { createLogger, logError } from '../shared/logger.js'
import { ensureError } from '../shared/assertError.js'
import { AppError } from '../shared/error.js'
import { createEventBus, type EventBus } from '../shared/eventBus.js'
import { err, ok, type Result } from '../shared/result.js'
import { createErrorLog, type ErrorLog } from './errorLog.js'
import { createOrchestrator, type Orchestrator, type OrchestratorTimings } from './orchestrator.js'
import { renderReport } from './report.js'
import { createScheduler, type RefreshInterval, type Scheduler } from './scheduler.js'
import type { CheckRegistry } from './registry.js'
import type { Probe } from './probe.js'
import type {
  CheckDefinition,
  CheckId,
  DiagnosticEvents,
  DiagnosticPass,
  ErrorLogEntry,
  RunOutcome,
} from './types.js'

const logger = createLogger('diagnostics')

export interface SettingsPatch {
  enabledChecks?: CheckId[]
  refreshInterval?: RefreshInterval
}

export interface SettingsStore {
  save(patch: SettingsPatch): Promise<void>
}

export type TextSink = (text: string) => Promise<void>

export interface DiagnosticServiceOptions {
  registry: CheckRegistry
  probes: Iterable<Probe>
  timings?: Partial<OrchestratorTimings>
  interval?: RefreshInterval
  /** Run a pass as soon as start() is called (default true) */
  runOnStart?: boolean
  store?: SettingsStore
  clipboard?: TextSink
  events?: EventBus<DiagnosticEvents>
}

export interface DiagnosticService {
  runNow(): Promise<RunOutcome>
  currentPass(): DiagnosticPass | null
  errorLogEntries(): readonly ErrorLogEntry[]
  /** Report of the given pass, or the current one; null before the first pass */
  renderReport(pass?: DiagnosticPass, options?: { includeErrorLog?: boolean }): string | null
  setRefreshInterval(interval: RefreshInterval): Promise<void>
  getRefreshInterval(): RefreshInterval
  setCheckEnabled(id: CheckId, enabled: boolean): Promise<Result<CheckDefinition, AppError>>
  listChecks(): readonly CheckDefinition[]
  copyReport(): Promise<Result<string, AppError>>
  start(): void
  stop(): void
  onPass(listener: (pass: DiagnosticPass) => void): () => void
  readonly events: EventBus<DiagnosticEvents>
  readonly registry: CheckRegistry
  readonly orchestrator: Orchestrator
  readonly scheduler: Scheduler
  readonly errorLog: ErrorLog
}

export function createDiagnosticService(options: DiagnosticServiceOptions): DiagnosticService {
  const { registry, store, clipboard } = options
  const events = options.events ?? createEventBus<DiagnosticEvents>()
  const errorLog = createErrorLog()

  const orchestrator = createOrchestrator({
    registry,
    probes: options.probes,
    events,
    ...options.timings,
  })

  // Subscribed on the cell itself: the log is updated inside publish()
  orchestrator.cell.subscribe(pass => errorLog.ingest(pass))

  const scheduler = createScheduler({
    orchestrator,
    interval: options.interval,
    runOnStart: options.runOnStart,
    events,
  })

  async function persist(patch: SettingsPatch): Promise<void> {
    if (!store) return
    try {
      await store.save(patch)
    } catch (error) {
      logError(logger, 'Settings save failed', ensureError(error))
    }
  }

  function report(pass?: DiagnosticPass, reportOptions: { includeErrorLog?: boolean } = {}): string | null {
    const target = pass ?? orchestrator.currentPass()
    if (!target) return null
    return renderReport(target, reportOptions.includeErrorLog ? { errorLog: errorLog.entries() } : {})
  }

  return {
    runNow() {
      return scheduler.runNow()
    },

    currentPass() {
      return orchestrator.currentPass()
    },

    errorLogEntries() {
      return errorLog.entries()
    },

    renderReport: report,

    async setRefreshInterval(interval) {
      scheduler.setRefreshInterval(interval)
      await persist({ refreshInterval: interval })
    },

    getRefreshInterval() {
      return scheduler.getRefreshInterval()
    },

    async setCheckEnabled(id, enabled) {
      const result = registry.setEnabled(id, enabled)
      if (!result.ok) return result
      await persist({ enabledChecks: registry.listEnabled().map(def => def.id) })
      return result
    },

    listChecks() {
      return registry.list()
    },

    async copyReport() {
      const text = report(undefined, { includeErrorLog: true })
      if (text === null) return err(AppError.noPass())
      if (!clipboard) return err(AppError.clipboardUnavailable('No clipboard configured'))
      try {
        await clipboard(text)
        return ok(text)
      } catch (error) {
        return err(AppError.fromError(error))
      }
    },

    start() {
      scheduler.start()
    },

    stop() {
      scheduler.stop()
      orchestrator.cancel()
    },

    onPass(listener) {
      return events.on('pass:published', ({ pass }) => listener(pass))
    },

    events,
    registry,
    orchestrator,
    scheduler,
    errorLog,
  }
}
