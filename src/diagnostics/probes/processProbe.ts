import { defineProbe, type Probe, type ProbeMeta, type ProbeOutcome } from '../probe.js'
import { findProcess, listProcesses, type ProcessLister, type ProcessMatch } from '../../sources/processes.js'
import type { DetailEntry } from '../types.js'

export interface ProcessPolicy {
  /** Substring matched against process names */
  name: string
  /** Missing process is critical rather than informational */
  required: boolean
  memoryLimitMb: number
}

export const DEFAULT_PROCESS_POLICY: ProcessPolicy = {
  name: 'opencode',
  required: false,
  memoryLimitMb: 2000,
}

export function classifyProcess(match: ProcessMatch | null, policy: ProcessPolicy = DEFAULT_PROCESS_POLICY): ProbeOutcome {
  if (!match) {
    const detail: DetailEntry[] = [['PROCESS', `${policy.name} not detected`]]
    return policy.required
      ? { status: 'critical', headline: 'NOT_RUNNING', detail }
      : { status: 'ok', headline: 'INACTIVE', detail }
  }

  const detail: DetailEntry[] = [
    ['PID', String(match.pid)],
    ['MEMORY', `${match.memoryMb}MB`],
  ]
  if (match.instances > 1) detail.push(['INSTANCES', String(match.instances)])

  if (match.memoryMb > policy.memoryLimitMb) {
    return { status: 'warning', headline: 'HIGH_MEMORY', detail }
  }
  return { status: 'ok', headline: 'RUNNING', detail }
}

export interface ProcessProbeOptions {
  listProcesses?: ProcessLister
  policy?: ProcessPolicy
}

export function createProcessProbe(meta: ProbeMeta, options: ProcessProbeOptions = {}): Probe {
  const list = options.listProcesses ?? listProcesses
  const policy = options.policy ?? DEFAULT_PROCESS_POLICY

  return defineProbe({
    ...meta,
    async run({ signal }) {
      const processes = await list({ signal })
      return classifyProcess(findProcess(processes, policy.name), policy)
    },
  })
}
