/**
 * @entry Diagnostics engine
 *
 * Probe, registry, orchestrator, error log, scheduler, report, service
 */

export * from './types.js'
export * from './status.js'
export * from './probe.js'
export { createCheckRegistry, type CheckRegistry, type CheckRegistration } from './registry.js'
export { createPassCell, type PassCell, type PassListener } from './passCell.js'
export {
  createOrchestrator,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_GRACE_MS,
  DEFAULT_MAX_CONCURRENCY,
  RUN_DEADLINE_FACTOR,
  type Orchestrator,
  type OrchestratorOptions,
  type OrchestratorTimings,
} from './orchestrator.js'
export { createErrorLog, reduceErrorLog, describeFailure, type ErrorLog } from './errorLog.js'
export {
  createScheduler,
  isRefreshInterval,
  REFRESH_INTERVALS,
  REFRESH_INTERVAL_PRESETS,
  type RefreshInterval,
  type Scheduler,
  type SchedulerState,
} from './scheduler.js'
export { renderReport, diagnose, STATUS_GLYPHS, type ReportOptions } from './report.js'
export {
  createDiagnosticService,
  type DiagnosticService,
  type DiagnosticServiceOptions,
  type SettingsPatch,
  type SettingsStore,
  type TextSink,
} from './service.js'
export {
  BUILTIN_CHECKS,
  builtinRegistrations,
  createBuiltinProbes,
  type BuiltinCheckId,
  type ProbeSources,
} from './probes/builtin.js'
