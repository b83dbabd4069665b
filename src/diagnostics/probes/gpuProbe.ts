import { defineProbe, type Probe, type ProbeMeta, type ProbeOutcome } from '../probe.js'
import { readGpuInfo, shortenGpuName, type GpuInfo, type GpuReader } from '../../sources/gpu.js'
import type { DetailEntry } from '../types.js'

export interface GpuThresholds {
  warning: number
  critical: number
}

export const DEFAULT_GPU_THRESHOLDS: GpuThresholds = { warning: 80, critical: 95 }

export function classifyGpu(gpus: readonly GpuInfo[] | null, t: GpuThresholds = DEFAULT_GPU_THRESHOLDS): ProbeOutcome {
  if (gpus === null) {
    return { status: 'ok', headline: 'INACTIVE', detail: [['GPU', 'nvidia-smi not found']] }
  }
  if (gpus.length === 0) {
    return { status: 'ok', headline: 'INACTIVE', detail: [['GPU', 'none detected']] }
  }

  const detail = gpus.map((gpu): DetailEntry => [
    shortenGpuName(gpu.name),
    gpu.usagePct === null ? 'n/a' : `${Math.round(gpu.usagePct)}%`,
  ])
  const maxUsage = Math.max(0, ...gpus.map(gpu => gpu.usagePct ?? 0))

  if (maxUsage > t.critical) return { status: 'critical', headline: 'CRITICAL_LOAD', detail }
  if (maxUsage > t.warning) return { status: 'warning', headline: 'HIGH_LOAD', detail }
  return { status: 'ok', headline: 'NORMAL', detail }
}

export interface GpuProbeOptions {
  readGpu?: GpuReader
  thresholds?: GpuThresholds
}

export function createGpuProbe(meta: ProbeMeta, options: GpuProbeOptions = {}): Probe {
  const readGpu = options.readGpu ?? readGpuInfo

  return defineProbe({
    ...meta,
    async run({ signal }) {
      return classifyGpu(await readGpu({ signal }), options.thresholds)
    },
  })
}
