/**
 * GPU utilisation via nvidia-smi
 */

import { execa } from 'execa'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'

export interface GpuInfo {
  name: string
  usagePct: number | null
  memoryMb: number | null
}

/** null when no GPU tooling is installed */
export type GpuReader = (options?: { signal?: AbortSignal }) => Promise<GpuInfo[] | null>

const QUERY_ARGS = ['--query-gpu=name,utilization.gpu,memory.used', '--format=csv,noheader,nounits']

function parseMetric(raw: string | undefined): number | null {
  if (raw === undefined) return null
  const value = parseFloat(raw)
  return Number.isNaN(value) ? null : value
}

/** "NVIDIA GeForce RTX 4090, 37, 2048" per line */
export function parseNvidiaSmiOutput(stdout: string): GpuInfo[] {
  const gpus: GpuInfo[] = []
  for (const line of stdout.split(/\r?\n/)) {
    if (!line.trim()) continue
    const [name, usage, memory] = line.split(',').map(part => part.trim())
    if (!name) continue
    gpus.push({ name, usagePct: parseMetric(usage), memoryMb: parseMetric(memory) })
  }
  return gpus
}

/** "NVIDIA GeForce RTX 4090" → "RTX 4090" */
export function shortenGpuName(name: string): string {
  const trimmed = name.trim()
  const uhd = trimmed.match(/UHD\D*(\d+)/)
  if (uhd?.[1]) return `Intel UHD ${uhd[1]}`
  const model = trimmed.match(/\b(RTX|GTX|RX)\s*(\d+[A-Za-z]*(?:\s(?:Ti|SUPER|XT))?)/)
  if (model?.[1] && model[2]) return `${model[1]} ${model[2]}`
  const stripped = trimmed.replace(/^(NVIDIA|AMD|Intel\(R\))\s+/, '').replace(/^GeForce\s+/, '')
  return stripped.length > 20 ? `${stripped.slice(0, 20)}...` : stripped
}

function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export const readGpuInfo: GpuReader = async (options = {}) => {
  try {
    const { stdout } = await execa('nvidia-smi', QUERY_ARGS, { cancelSignal: options.signal })
    return parseNvidiaSmiOutput(stdout)
  } catch (error) {
    if (options.signal?.aborted) throw error
    if (isMissingBinary(error)) return null
    throw AppError.probeUnavailable(`nvidia-smi failed: ${getErrorMessage(error)}`, error)
  }
}
