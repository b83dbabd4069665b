/**
 * Builds the diagnostic service the commands share, from settings
 */

import { createLogger } from '../shared/logger.js'
import { loadConfig, saveConfig, getEngineTimings, DEFAULT_ENABLED_CHECKS, type Config } from '../config/index.js'
import {
  builtinRegistrations,
  createBuiltinProbes,
  createCheckRegistry,
  createDiagnosticService,
  type DiagnosticService,
  type ProbeSources,
  type RefreshInterval,
  type SettingsStore,
  type TextSink,
} from '../diagnostics/index.js'
import { writeClipboard } from '../sources/clipboard.js'
import { getPalette, type Palette } from './theme.js'

const logger = createLogger('cli')

export interface CliContext {
  config: Config
  service: DiagnosticService
  palette: Palette
}

export interface CliContextOptions {
  interval?: RefreshInterval
  runOnStart?: boolean
  /** Test seams */
  sources?: ProbeSources
  store?: SettingsStore
  clipboard?: TextSink
  config?: Config
}

export const configSettingsStore: SettingsStore = {
  async save(patch) {
    await saveConfig({
      ...(patch.enabledChecks ? { enabled_checks: patch.enabledChecks } : {}),
      ...(patch.refreshInterval ? { refresh_interval: patch.refreshInterval } : {}),
    })
  },
}

export async function createCliContext(options: CliContextOptions = {}): Promise<CliContext> {
  const config = options.config ?? (await loadConfig())

  const registry = createCheckRegistry(builtinRegistrations(DEFAULT_ENABLED_CHECKS))
  const applied = registry.applyEnabledSet(config.enabled_checks)
  if (!applied.ok) {
    logger.warn(`${applied.error.message}; keeping the default checks`)
  }

  const service = createDiagnosticService({
    registry,
    probes: createBuiltinProbes(config, options.sources),
    timings: getEngineTimings(config),
    interval: options.interval ?? config.refresh_interval,
    runOnStart: options.runOnStart,
    store: options.store ?? configSettingsStore,
    clipboard: options.clipboard ?? writeClipboard,
  })

  return { config, service, palette: getPalette(config.theme) }
}
