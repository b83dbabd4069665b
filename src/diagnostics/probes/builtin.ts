/**
 * Built-in checks and their probes, wired from settings
 */

import { AppError } from '../../shared/error.js'
import type { Config, ApiEndpointConfig } from '../../config/schema.js'
import type { CheckRegistration } from '../registry.js'
import type { Probe, ProbeMeta } from '../probe.js'
import type { MetricReader } from '../../sources/metrics.js'
import type { GpuReader } from '../../sources/gpu.js'
import type { HttpProber, Pinger } from '../../sources/http.js'
import type { ProcessLister } from '../../sources/processes.js'
import type { VpnDetector } from '../../sources/vpn.js'
import { createSystemProbe } from './systemProbe.js'
import { createGpuProbe } from './gpuProbe.js'
import { createNetworkProbe } from './networkProbe.js'
import { createVpnProbe } from './vpnProbe.js'
import { createApiProbe, type ApiEndpoint } from './apiProbe.js'
import { createProcessProbe } from './processProbe.js'
import { createTerminalsProbe } from './terminalsProbe.js'

export const BUILTIN_CHECKS = [
  { id: 'local_resources', category: 'system', displayName: 'Local Resources' },
  { id: 'gpu', category: 'system', displayName: 'GPU' },
  { id: 'internet', category: 'network', displayName: 'Internet' },
  { id: 'vpn', category: 'network', displayName: 'VPN' },
  { id: 'claude_api', category: 'api-provider', displayName: 'Claude API' },
  { id: 'openai_api', category: 'api-provider', displayName: 'OpenAI API' },
  { id: 'google_api', category: 'api-provider', displayName: 'Google AI' },
  { id: 'opencode', category: 'process', displayName: 'OpenCode' },
  { id: 'terminals', category: 'process', displayName: 'Terminals' },
] as const satisfies readonly ProbeMeta[]

export type BuiltinCheckId = (typeof BUILTIN_CHECKS)[number]['id']

/** Registry entries with `enabled` taken from the configured set */
export function builtinRegistrations(enabledIds: readonly string[]): CheckRegistration[] {
  const enabled = new Set(enabledIds)
  return BUILTIN_CHECKS.map(check => ({ ...check, enabled: enabled.has(check.id) }))
}

/** Collaborators; anything left out uses the real implementation */
export interface ProbeSources {
  readMetrics?: MetricReader
  readGpu?: GpuReader
  ping?: Pinger
  http?: HttpProber
  listProcesses?: ProcessLister
  detectVpn?: VpnDetector
}

/** Endpoint with the auth header filled in from the environment, when the key is set */
export function resolveApiEndpoint(config: ApiEndpointConfig, env: NodeJS.ProcessEnv = process.env): ApiEndpoint {
  const headers: Record<string, string> = { ...config.headers }
  const key = config.api_key_env ? env[config.api_key_env] : undefined
  if (key) {
    const header = config.auth_header.toLowerCase()
    headers[header] = header === 'authorization' ? `Bearer ${key}` : key
  }
  return { url: config.url, method: config.method, headers }
}

function meta(id: BuiltinCheckId): ProbeMeta {
  const check = BUILTIN_CHECKS.find(c => c.id === id)
  if (!check) throw AppError.invariant(`No built-in check ${id}`)
  return check
}

export function createBuiltinProbes(config: Config, sources: ProbeSources = {}): Probe[] {
  const t = config.thresholds

  return [
    createSystemProbe(meta('local_resources'), {
      readMetrics: sources.readMetrics,
      thresholds: {
        cpuWarning: t.cpu_warning,
        cpuCritical: t.cpu_critical,
        ramWarning: t.ram_warning,
        ramCritical: t.ram_critical,
        lowDiskPct: t.low_disk_pct,
      },
    }),
    createGpuProbe(meta('gpu'), {
      readGpu: sources.readGpu,
      thresholds: { warning: t.gpu_warning, critical: t.gpu_critical },
    }),
    createNetworkProbe(meta('internet'), {
      ping: sources.ping,
      primaryUrl: config.network.primary,
      fallbackUrl: config.network.fallback,
      slowMs: t.slow_network_ms,
    }),
    createVpnProbe(meta('vpn'), {
      detect: sources.detectVpn,
      ping: sources.ping,
      referenceUrl: config.vpn.reference_host,
    }),
    createApiProbe(meta('claude_api'), { endpoint: resolveApiEndpoint(config.apis.claude_api), http: sources.http }),
    createApiProbe(meta('openai_api'), { endpoint: resolveApiEndpoint(config.apis.openai_api), http: sources.http }),
    createApiProbe(meta('google_api'), { endpoint: resolveApiEndpoint(config.apis.google_api), http: sources.http }),
    createProcessProbe(meta('opencode'), {
      listProcesses: sources.listProcesses,
      policy: {
        name: config.process.name,
        required: config.process.required,
        memoryLimitMb: config.process.memory_limit_mb,
      },
    }),
    createTerminalsProbe(meta('terminals'), {
      listProcesses: sources.listProcesses,
      manyThreshold: t.many_terminals,
    }),
  ]
}
