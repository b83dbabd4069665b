/**
 * HTTP collaborators over global fetch
 *
 * - ping: reachability of a URL via GET (some hosts refuse HEAD), never
 *   throws except on abort
 * - httpProbe: one request, status + body excerpt; connection failures
 *   become TRANSPORT_FAILURE
 */

import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('http')

const BODY_EXCERPT_LIMIT = 500

export interface PingResult {
  reachable: boolean
  latencyMs: number
  statusCode?: number
}

export interface PingOptions {
  signal?: AbortSignal
  method?: 'HEAD' | 'GET'
}

export type Pinger = (url: string, options?: PingOptions) => Promise<PingResult>

export interface HttpProbeOptions {
  signal?: AbortSignal
  method?: 'HEAD' | 'GET'
  headers?: Record<string, string>
}

export interface HttpProbeResult {
  statusCode: number
  latencyMs: number
  bodyExcerpt: string
}

export type HttpProber = (url: string, options?: HttpProbeOptions) => Promise<HttpProbeResult>

/** "https://api.example.com/v1/models" → "api.example.com" */
export function hostOf(url: string): string {
  try {
    return new URL(url).host
  } catch {
    return url
  }
}

function rethrowIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw signal.reason instanceof Error ? signal.reason : new Error('aborted')
  }
}

export const ping: Pinger = async (url, options = {}) => {
  const startedAt = Date.now()
  try {
    const response = await fetch(url, {
      method: options.method ?? 'GET',
      signal: options.signal,
      redirect: 'follow',
    })
    // Only the status matters
    await response.body?.cancel().catch((error: unknown) => {
      logger.debug(`Discarding body of ${hostOf(url)} failed: ${getErrorMessage(error)}`)
    })
    return {
      reachable: response.ok,
      latencyMs: Date.now() - startedAt,
      statusCode: response.status,
    }
  } catch {
    rethrowIfAborted(options.signal)
    return { reachable: false, latencyMs: Date.now() - startedAt }
  }
}

export const httpProbe: HttpProber = async (url, options = {}) => {
  const startedAt = Date.now()
  let response: Response
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      signal: options.signal,
      headers: options.headers,
    })
  } catch (error) {
    rethrowIfAborted(options.signal)
    const cause = error instanceof Error && error.cause !== undefined ? error.cause : error
    throw AppError.transport(`${hostOf(url)}: ${getErrorMessage(cause)}`, error)
  }

  const latencyMs = Date.now() - startedAt
  let bodyExcerpt = ''
  if (options.method !== 'HEAD') {
    try {
      bodyExcerpt = (await response.text()).slice(0, BODY_EXCERPT_LIMIT)
    } catch (error) {
      rethrowIfAborted(options.signal)
      bodyExcerpt = `(body unreadable: ${getErrorMessage(error)})`
    }
  }

  return { statusCode: response.status, latencyMs, bodyExcerpt }
}
