/**
 * Process table via `ps` (POSIX) or `tasklist` (Windows)
 */

import { execa } from 'execa'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'

export interface ProcessInfo {
  pid: number
  name: string
  memoryMb: number
}

export interface ProcessMatch {
  /** First matching pid */
  pid: number
  /** Summed over all instances */
  memoryMb: number
  instances: number
}

export type ProcessLister = (options?: { signal?: AbortSignal }) => Promise<ProcessInfo[]>

/** `ps -axo pid=,rss=,comm=` lines: "  123  20480 /usr/bin/node" */
export function parsePsOutput(stdout: string): ProcessInfo[] {
  const processes: ProcessInfo[] = []
  for (const line of stdout.split('\n')) {
    const match = line.trim().match(/^(\d+)\s+(\d+)\s+(.+)$/)
    if (!match?.[1] || !match[2] || !match[3]) continue
    const command = match[3].trim()
    processes.push({
      pid: parseInt(match[1], 10),
      name: command.split('/').pop() ?? command,
      memoryMb: Math.round(parseInt(match[2], 10) / 1024),
    })
  }
  return processes
}

/** `tasklist /fo csv /nh` lines: "\"node.exe\",\"1234\",\"Console\",\"1\",\"45,320 K\"" */
export function parseTasklistOutput(stdout: string): ProcessInfo[] {
  const processes: ProcessInfo[] = []
  for (const line of stdout.split(/\r?\n/)) {
    const fields = [...line.matchAll(/"([^"]*)"/g)].map(m => m[1] ?? '')
    const [name, pid, , , memory] = fields
    if (!name || !pid || memory === undefined) continue
    const kb = parseInt(memory.replace(/[^\d]/g, ''), 10)
    processes.push({
      pid: parseInt(pid, 10),
      name,
      memoryMb: Number.isNaN(kb) ? 0 : Math.round(kb / 1024),
    })
  }
  return processes
}

export const listProcesses: ProcessLister = async (options = {}) => {
  const windows = process.platform === 'win32'
  const command = windows ? 'tasklist' : 'ps'
  const args = windows ? ['/fo', 'csv', '/nh'] : ['-axo', 'pid=,rss=,comm=']

  try {
    const { stdout } = await execa(command, args, { cancelSignal: options.signal })
    return windows ? parseTasklistOutput(stdout) : parsePsOutput(stdout)
  } catch (error) {
    if (options.signal?.aborted) throw error
    throw AppError.probeUnavailable(`${command} failed: ${getErrorMessage(error)}`, error)
  }
}

/** Case-insensitive substring match on the process name */
export function findProcess(processes: readonly ProcessInfo[], name: string): ProcessMatch | null {
  const needle = name.toLowerCase()
  const matches = processes.filter(p => p.name.toLowerCase().includes(needle))
  const first = matches[0]
  if (!first) return null
  return {
    pid: first.pid,
    memoryMb: matches.reduce((sum, p) => sum + p.memoryMb, 0),
    instances: matches.length,
  }
}
