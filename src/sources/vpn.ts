/**
 * VPN interface detection from os.networkInterfaces()
 */

import os from 'node:os'

export interface VpnInterface {
  name: string
  address: string
}

export type InterfaceTable = ReturnType<typeof os.networkInterfaces>

export type VpnDetector = () => VpnInterface[]

const VPN_INTERFACE_PATTERN = /^(tun|tap|wg|utun|ppp|ipsec|tailscale|nordlynx|proton|zt)/i

export function isVpnInterfaceName(name: string): boolean {
  return VPN_INTERFACE_PATTERN.test(name)
}

/** VPN-looking interfaces that carry a non-internal IPv4 address */
export function findVpnInterfaces(table: InterfaceTable): VpnInterface[] {
  const found: VpnInterface[] = []
  for (const [name, addresses] of Object.entries(table)) {
    if (!addresses || !isVpnInterfaceName(name)) continue
    const ipv4 = addresses.find(a => a.family === 'IPv4' && !a.internal)
    if (ipv4) found.push({ name, address: ipv4.address })
  }
  return found
}

export const detectVpnInterfaces: VpnDetector = () => findVpnInterfaces(os.networkInterfaces())
