/**
 * VPN presence check
 *
 * No VPN is not a fault. An active VPN only escalates when a configured
 * reference host stops answering through it.
 */

import { defineProbe, type Probe, type ProbeMeta } from '../probe.js'
import { hostOf, ping, type Pinger } from '../../sources/http.js'
import { detectVpnInterfaces, type VpnDetector } from '../../sources/vpn.js'
import type { DetailEntry } from '../types.js'

export interface VpnProbeOptions {
  detect?: VpnDetector
  ping?: Pinger
  referenceUrl?: string
}

export function createVpnProbe(meta: ProbeMeta, options: VpnProbeOptions = {}): Probe {
  const detect = options.detect ?? detectVpnInterfaces
  const pinger = options.ping ?? ping

  return defineProbe({
    ...meta,
    async run({ signal }) {
      const interfaces = detect()
      if (interfaces.length === 0) {
        return { status: 'ok', headline: 'INACTIVE', detail: [['VPN', 'not detected']] }
      }

      const detail: DetailEntry[] = [
        ['INTERFACE', interfaces.map(i => `${i.name} (${i.address})`).join(', ')],
      ]

      if (!options.referenceUrl) {
        detail.push(['REFERENCE', 'not configured'])
        return { status: 'unknown', headline: 'ACTIVE', detail }
      }

      const reference = await pinger(options.referenceUrl, { signal })
      const host = hostOf(options.referenceUrl)
      if (reference.reachable) {
        detail.push(['REFERENCE', `${host} reachable`], ['PING', `${reference.latencyMs}ms`])
        return { status: 'ok', headline: 'ACTIVE', detail }
      }

      detail.push(['REFERENCE', `${host} unreachable`])
      return { status: 'critical', headline: 'BLOCKING', detail }
    },
  })
}
