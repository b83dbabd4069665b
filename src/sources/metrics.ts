/**
 * Local machine metrics: CPU load from two os.cpus() samples, RAM from
 * totalmem/freemem, disk from statfs on the working volume.
 */

import os from 'node:os'
import { parse } from 'node:path'
import { statfs } from 'node:fs/promises'
import { setTimeout as delay } from 'node:timers/promises'

export type DiskState = 'ok' | 'low' | 'unknown'

export interface SystemMetrics {
  cpuPct: number
  ramPct: number
  diskState: DiskState
  diskFreePct?: number
}

export interface MetricReadOptions {
  signal?: AbortSignal
  /** Gap between the two CPU samples */
  sampleMs?: number
  /** Free space below this percentage counts as low */
  lowDiskPct?: number
  diskPath?: string
}

export type MetricReader = (options?: MetricReadOptions) => Promise<SystemMetrics>

interface CpuSample {
  idle: number
  total: number
}

function sampleCpu(): CpuSample {
  let idle = 0
  let total = 0
  for (const cpu of os.cpus()) {
    const { user, nice, sys, irq } = cpu.times
    idle += cpu.times.idle
    total += user + nice + sys + irq + cpu.times.idle
  }
  return { idle, total }
}

export function cpuPercent(before: CpuSample, after: CpuSample): number {
  const total = after.total - before.total
  if (total <= 0) return 0
  const busy = total - (after.idle - before.idle)
  return Math.round((busy / total) * 100)
}

export function ramPercent(totalBytes: number, freeBytes: number): number {
  if (totalBytes <= 0) return 0
  return Math.round(((totalBytes - freeBytes) / totalBytes) * 100)
}

async function readDisk(path: string, lowDiskPct: number): Promise<Pick<SystemMetrics, 'diskState' | 'diskFreePct'>> {
  try {
    const stats = await statfs(path)
    if (stats.blocks <= 0) return { diskState: 'unknown' }
    const freePct = Math.round((stats.bavail / stats.blocks) * 100)
    return { diskState: freePct < lowDiskPct ? 'low' : 'ok', diskFreePct: freePct }
  } catch {
    return { diskState: 'unknown' }
  }
}

export const readSystemMetrics: MetricReader = async (options = {}) => {
  const sampleMs = options.sampleMs ?? 200
  const lowDiskPct = options.lowDiskPct ?? 10
  const diskPath = options.diskPath ?? parse(process.cwd()).root

  const before = sampleCpu()
  await delay(sampleMs, undefined, { signal: options.signal })
  const after = sampleCpu()

  return {
    cpuPct: cpuPercent(before, after),
    ramPct: ramPercent(os.totalmem(), os.freemem()),
    ...(await readDisk(diskPath, lowDiskPct)),
  }
}
