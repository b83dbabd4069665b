/**
 * Open terminal/shell sessions; many open shells usually means many agents
 */

import { defineProbe, type Probe, type ProbeMeta, type ProbeOutcome } from '../probe.js'
import { listProcesses, type ProcessInfo, type ProcessLister } from '../../sources/processes.js'

export const DEFAULT_MANY_TERMINALS = 10

const TERMINAL_KINDS: Record<string, string> = {
  cmd: 'cmd',
  powershell: 'ps',
  pwsh: 'ps',
  windowsterminal: 'wt',
  wt: 'wt',
  bash: 'bash',
  zsh: 'zsh',
  fish: 'fish',
  sh: 'sh',
  dash: 'dash',
  ksh: 'ksh',
  tcsh: 'tcsh',
  nu: 'nu',
}

/** "-zsh" → "zsh", "PowerShell.exe" → "ps"; null for anything that is not a terminal */
export function terminalKind(processName: string): string | null {
  const base = processName.toLowerCase().replace(/^-/, '').replace(/\.exe$/, '')
  return TERMINAL_KINDS[base] ?? null
}

export function classifyTerminals(processes: readonly ProcessInfo[], manyThreshold = DEFAULT_MANY_TERMINALS): ProbeOutcome {
  const counts = new Map<string, number>()
  let total = 0
  let memoryMb = 0
  for (const proc of processes) {
    const kind = terminalKind(proc.name)
    if (!kind) continue
    counts.set(kind, (counts.get(kind) ?? 0) + 1)
    total++
    memoryMb += proc.memoryMb
  }

  if (total === 0) {
    return { status: 'ok', headline: 'INACTIVE', detail: [['TERMINALS', 'none detected']] }
  }

  const breakdown = [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([kind, count]) => `${kind}:${count}`)
    .join(' ')

  const detail = [
    ['TERMINALS', breakdown],
    ['COUNT', String(total)],
    ['MEMORY', `${memoryMb}MB`],
  ] as const

  if (total > manyThreshold) {
    return { status: 'warning', headline: 'MANY_TERMINALS', detail }
  }
  return { status: 'ok', headline: 'ACTIVE', detail }
}

export interface TerminalsProbeOptions {
  listProcesses?: ProcessLister
  manyThreshold?: number
}

export function createTerminalsProbe(meta: ProbeMeta, options: TerminalsProbeOptions = {}): Probe {
  const list = options.listProcesses ?? listProcesses

  return defineProbe({
    ...meta,
    async run({ signal }) {
      return classifyTerminals(await list({ signal }), options.manyThreshold)
    },
  })
}
