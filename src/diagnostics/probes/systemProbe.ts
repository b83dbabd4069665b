import { defineProbe, type Probe, type ProbeMeta, type ProbeOutcome } from '../probe.js'
import { readSystemMetrics, type MetricReader, type SystemMetrics } from '../../sources/metrics.js'
import type { DetailEntry } from '../types.js'

export interface SystemThresholds {
  cpuWarning: number
  cpuCritical: number
  ramWarning: number
  ramCritical: number
  lowDiskPct: number
}

export const DEFAULT_SYSTEM_THRESHOLDS: SystemThresholds = {
  cpuWarning: 70,
  cpuCritical: 90,
  ramWarning: 85,
  ramCritical: 95,
  lowDiskPct: 10,
}

export function describeDisk(metrics: SystemMetrics): string {
  if (metrics.diskState === 'unknown') return 'unknown'
  const free = metrics.diskFreePct !== undefined ? `${metrics.diskFreePct}% free` : 'free space unknown'
  return metrics.diskState === 'low' ? `low (${free})` : free
}

export function classifySystem(metrics: SystemMetrics, t: SystemThresholds = DEFAULT_SYSTEM_THRESHOLDS): ProbeOutcome {
  const detail: DetailEntry[] = [
    ['CPU', `${metrics.cpuPct}%`],
    ['RAM', `${metrics.ramPct}%`],
    ['DISK', describeDisk(metrics)],
  ]

  if (metrics.cpuPct > t.cpuCritical || metrics.ramPct > t.ramCritical) {
    return { status: 'critical', headline: 'CRITICAL_LOAD', detail }
  }
  if (metrics.cpuPct > t.cpuWarning || metrics.ramPct > t.ramWarning) {
    return { status: 'warning', headline: 'HIGH_LOAD', detail }
  }
  if (metrics.diskState === 'low') {
    return { status: 'warning', headline: 'LOW_DISK', detail }
  }
  return { status: 'ok', headline: 'NORMAL', detail }
}

export interface SystemProbeOptions {
  readMetrics?: MetricReader
  thresholds?: SystemThresholds
}

export function createSystemProbe(meta: ProbeMeta, options: SystemProbeOptions = {}): Probe {
  const readMetrics = options.readMetrics ?? readSystemMetrics
  const thresholds = options.thresholds ?? DEFAULT_SYSTEM_THRESHOLDS

  return defineProbe({
    ...meta,
    async run({ signal }) {
      const metrics = await readMetrics({ signal, lowDiskPct: thresholds.lowDiskPct })
      return classifySystem(metrics, thresholds)
    },
  })
}
