import { describe, it, expect, vi } from 'vitest'
import { createNetworkProbe } from '../networkProbe.js'
import { createVpnProbe } from '../vpnProbe.js'
import type { PingResult } from '../../../sources/http.js'
import type { ProbeMeta } from '../../probe.js'

const internetMeta: ProbeMeta = { id: 'internet', category: 'network', displayName: 'Internet' }
const vpnMeta: ProbeMeta = { id: 'vpn', category: 'network', displayName: 'VPN' }

function ctx() {
  return { timeoutMs: 1000, signal: new AbortController().signal }
}

function pinger(table: Record<string, PingResult>) {
  return vi.fn(async (url: string): Promise<PingResult> => table[url] ?? { reachable: false, latencyMs: 0 })
}

const options = { primaryUrl: 'https://primary.test', fallbackUrl: 'https://fallback.test' }

describe('createNetworkProbe', () => {
  it('is online when the primary answers', async () => {
    const ping = pinger({ 'https://primary.test': { reachable: true, latencyMs: 80 } })
    const result = await createNetworkProbe(internetMeta, { ...options, ping }).execute(ctx())

    expect(result.status).toBe('ok')
    expect(result.headline).toBe('ONLINE')
    expect(result.detail).toEqual([
      ['PING', '80ms'],
      ['HOST', 'primary.test'],
    ])
    expect(ping).toHaveBeenCalledTimes(1)
  })

  it('is slow above the latency threshold', async () => {
    const ping = pinger({ 'https://primary.test': { reachable: true, latencyMs: 2500 } })
    const result = await createNetworkProbe(internetMeta, { ...options, ping }).execute(ctx())
    expect(result.status).toBe('warning')
    expect(result.headline).toBe('SLOW')
  })

  it('is degraded when only the fallback answers', async () => {
    const ping = pinger({ 'https://fallback.test': { reachable: true, latencyMs: 40 } })
    const result = await createNetworkProbe(internetMeta, { ...options, ping }).execute(ctx())

    expect(result.status).toBe('warning')
    expect(result.headline).toBe('DEGRADED')
    expect(result.detail).toEqual([
      ['PRIMARY', 'primary.test unreachable'],
      ['FALLBACK', 'fallback.test reachable'],
      ['PING', '40ms'],
    ])
  })

  it('is offline when nothing answers', async () => {
    const result = await createNetworkProbe(internetMeta, { ...options, ping: pinger({}) }).execute(ctx())
    expect(result.status).toBe('critical')
    expect(result.headline).toBe('OFFLINE')
  })
})

describe('createVpnProbe', () => {
  it('treats no VPN as fine', async () => {
    const result = await createVpnProbe(vpnMeta, { detect: () => [] }).execute(ctx())
    expect(result.status).toBe('ok')
    expect(result.headline).toBe('INACTIVE')
    expect(result.detail).toEqual([['VPN', 'not detected']])
  })

  it('cannot judge an active VPN without a reference host', async () => {
    const result = await createVpnProbe(vpnMeta, {
      detect: () => [{ name: 'wg0', address: '10.8.0.2' }],
    }).execute(ctx())

    expect(result.status).toBe('unknown')
    expect(result.headline).toBe('ACTIVE')
    expect(result.detail).toEqual([
      ['INTERFACE', 'wg0 (10.8.0.2)'],
      ['REFERENCE', 'not configured'],
    ])
  })

  it('is active when the reference host answers through it', async () => {
    const result = await createVpnProbe(vpnMeta, {
      detect: () => [{ name: 'utun3', address: '100.64.0.5' }],
      referenceUrl: 'https://ref.test',
      ping: pinger({ 'https://ref.test': { reachable: true, latencyMs: 120 } }),
    }).execute(ctx())

    expect(result.status).toBe('ok')
    expect(result.detail).toEqual([
      ['INTERFACE', 'utun3 (100.64.0.5)'],
      ['REFERENCE', 'ref.test reachable'],
      ['PING', '120ms'],
    ])
  })

  it('is blocking when the reference host does not answer', async () => {
    const result = await createVpnProbe(vpnMeta, {
      detect: () => [{ name: 'tun0', address: '10.0.0.7' }],
      referenceUrl: 'https://ref.test',
      ping: pinger({}),
    }).execute(ctx())

    expect(result.status).toBe('critical')
    expect(result.headline).toBe('BLOCKING')
  })
})
