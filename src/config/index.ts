/**
 * @entry Config
 *
 * YAML settings, schema validation, env overrides
 */

export {
  loadConfig,
  saveConfig,
  getDefaultConfig,
  clearConfigCache,
  applyEnvOverrides,
  findConfigPaths,
  resolveWritePath,
  mergeConfigLayers,
  CONFIG_FILENAME,
} from './loadConfig.js'
export * from './schema.js'

import { parseDuration } from '../shared/formatTime.js'
import type { Config } from './schema.js'

export interface EngineTimings {
  probeTimeoutMs: number
  runDeadlineMs?: number
  maxConcurrency: number
}

/** Duration strings → milliseconds for the orchestrator */
export function getEngineTimings(config: Config): EngineTimings {
  return {
    probeTimeoutMs: parseDuration(config.probe_timeout),
    ...(config.run_deadline ? { runDeadlineMs: parseDuration(config.run_deadline) } : {}),
    maxConcurrency: config.max_concurrency,
  }
}
