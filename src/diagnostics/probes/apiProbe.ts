/**
 * Third-party API availability
 *
 * One bounded request; the HTTP status is mapped, never interpreted further.
 */

import { AppError } from '../../shared/error.js'
import { defineProbe, type Probe, type ProbeMeta, type ProbeOutcome } from '../probe.js'
import { hostOf, httpProbe, type HttpProber, type HttpProbeResult } from '../../sources/http.js'
import type { CheckStatus, DetailEntry } from '../types.js'

const MESSAGE_LIMIT = 160

export interface ApiEndpoint {
  url: string
  method?: 'GET' | 'HEAD'
  headers?: Record<string, string>
}

export function classifyHttpStatus(statusCode: number): { status: CheckStatus; headline: string } {
  if (statusCode === 429) return { status: 'warning', headline: 'RATE_LIMITED' }
  if (statusCode === 503 || statusCode === 529) return { status: 'critical', headline: 'OVERLOADED' }
  if (statusCode >= 500 && statusCode <= 599) return { status: 'critical', headline: 'DOWN' }
  if (statusCode >= 200 && statusCode <= 299) return { status: 'ok', headline: 'AVAILABLE' }
  return { status: 'unknown', headline: 'UNEXPECTED_STATUS' }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Provider error text from a response body.
 * JSON `error.message`, `error` or `message`; otherwise the body.
 * Whitespace runs collapse to single spaces.
 */
export function extractErrorMessage(body: string): string | null {
  const message = pickErrorMessage(body.trim())
  if (message === null) return null
  const collapsed = message.replace(/\s+/g, ' ').trim()
  return collapsed ? collapsed.slice(0, MESSAGE_LIMIT) : null
}

function pickErrorMessage(trimmed: string): string | null {
  if (!trimmed) return null

  let parsed: unknown
  try {
    parsed = JSON.parse(trimmed)
  } catch {
    return trimmed
  }

  if (isRecord(parsed)) {
    const { error, message } = parsed
    if (isRecord(error) && typeof error.message === 'string') return error.message
    if (typeof error === 'string') return error
    if (typeof message === 'string') return message
  }
  return trimmed
}

export interface ApiProbeOptions {
  endpoint: ApiEndpoint
  http?: HttpProber
}

export function createApiProbe(meta: ProbeMeta, options: ApiProbeOptions): Probe {
  const http = options.http ?? httpProbe
  const { endpoint } = options
  const host = hostOf(endpoint.url)

  return defineProbe({
    ...meta,
    async run({ signal }): Promise<ProbeOutcome> {
      let response: HttpProbeResult
      try {
        response = await http(endpoint.url, { signal, method: endpoint.method, headers: endpoint.headers })
      } catch (error) {
        const appError = AppError.fromError(error)
        if (appError.code !== 'TRANSPORT_FAILURE') throw error
        return {
          status: 'critical',
          headline: 'DOWN',
          detail: [['ENDPOINT', host]],
          error: appError.message,
        }
      }

      const { status, headline } = classifyHttpStatus(response.statusCode)
      const detail: DetailEntry[] = [
        ['ENDPOINT', host],
        ['HTTP', String(response.statusCode)],
        ['LATENCY', `${response.latencyMs}ms`],
      ]
      if (status !== 'ok') {
        const message = extractErrorMessage(response.bodyExcerpt)
        if (message) detail.push(['MESSAGE', message])
      }

      return { status, headline, detail }
    },
  })
}
