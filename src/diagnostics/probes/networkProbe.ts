/**
 * Internet reachability: primary host, then a fallback host
 */

import { defineProbe, type Probe, type ProbeMeta } from '../probe.js'
import { hostOf, ping, type Pinger } from '../../sources/http.js'

export const DEFAULT_PRIMARY_URL = 'https://www.google.com'
export const DEFAULT_FALLBACK_URL = 'https://1.1.1.1'
export const DEFAULT_SLOW_MS = 2000

export interface NetworkProbeOptions {
  ping?: Pinger
  primaryUrl?: string
  fallbackUrl?: string
  slowMs?: number
}

export function createNetworkProbe(meta: ProbeMeta, options: NetworkProbeOptions = {}): Probe {
  const pinger = options.ping ?? ping
  const primaryUrl = options.primaryUrl ?? DEFAULT_PRIMARY_URL
  const fallbackUrl = options.fallbackUrl ?? DEFAULT_FALLBACK_URL
  const slowMs = options.slowMs ?? DEFAULT_SLOW_MS

  return defineProbe({
    ...meta,
    async run({ signal }) {
      const primary = await pinger(primaryUrl, { signal })
      if (primary.reachable) {
        return {
          status: primary.latencyMs > slowMs ? 'warning' : 'ok',
          headline: primary.latencyMs > slowMs ? 'SLOW' : 'ONLINE',
          detail: [
            ['PING', `${primary.latencyMs}ms`],
            ['HOST', hostOf(primaryUrl)],
          ],
        }
      }

      const fallback = await pinger(fallbackUrl, { signal })
      if (fallback.reachable) {
        return {
          status: 'warning',
          headline: 'DEGRADED',
          detail: [
            ['PRIMARY', `${hostOf(primaryUrl)} unreachable`],
            ['FALLBACK', `${hostOf(fallbackUrl)} reachable`],
            ['PING', `${fallback.latencyMs}ms`],
          ],
        }
      }

      return {
        status: 'critical',
        headline: 'OFFLINE',
        detail: [
          ['PRIMARY', `${hostOf(primaryUrl)} unreachable`],
          ['FALLBACK', `${hostOf(fallbackUrl)} unreachable`],
        ],
      }
    },
  })
}
