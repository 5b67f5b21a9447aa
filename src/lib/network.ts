import { lookup } from "node:dns/promises"
import { BlockList, isIP } from "node:net"

const BLOCKED_IPV4_CIDRS: Array<[string, number]> = [
  ["0.0.0.0", 8],
  ["10.0.0.0", 8],
  ["100.64.0.0", 10],
  ["127.0.0.0", 8],
  ["169.254.0.0", 16],
  ["172.16.0.0", 12],
  ["192.0.0.0", 24],
  ["192.0.2.0", 24],
  ["192.168.0.0", 16],
  ["198.18.0.0", 15],
  ["198.51.100.0", 24],
  ["203.0.113.0", 24],
  ["224.0.0.0", 4],
  ["240.0.0.0", 4],
]

const BLOCKED_IPV6_CIDRS: Array<[string, number]> = [
  ["::", 128],
  ["::1", 128],
  ["fc00::", 7],
  ["fe80::", 10],
  ["ff00::", 8],
  ["2001:db8::", 32],
]

const blockList = new BlockList()
for (const [network, prefix] of BLOCKED_IPV4_CIDRS) {
  blockList.addSubnet(network, prefix, "ipv4")
}
for (const [network, prefix] of BLOCKED_IPV6_CIDRS) {
  blockList.addSubnet(network, prefix, "ipv6")
}

const IPV4_MAPPED_RE = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i

export function isPrivateIp(ip: string): boolean {
  const address = stripBrackets(ip).split("%")[0] ?? ""
  const mapped = IPV4_MAPPED_RE.exec(address)
  if (mapped?.[1]) {
    return blockList.check(mapped[1], "ipv4")
  }

  const family = isIP(address)
  if (family === 4) {
    return blockList.check(address, "ipv4")
  }

  if (family === 6) {
    return blockList.check(address, "ipv6")
  }

  return true
}

export async function assertPublicHost(host: string): Promise<void> {
  const literal = stripBrackets(host)
  if (isIP(literal) !== 0) {
    if (isPrivateIp(literal)) {
      throw new Error(`Host ${host} is not a public IP address`)
    }
    return
  }

  const addresses = await lookup(literal, { all: true, verbatim: true })
  if (addresses.length === 0) {
    throw new Error(`Could not resolve host ${host}`)
  }

  for (const resolved of addresses) {
    if (isPrivateIp(resolved.address)) {
      throw new Error(`Resolved non-public address ${resolved.address} for host ${host}`)
    }
  }
}

function stripBrackets(host: string): string {
  return host.startsWith("[") && host.endsWith("]") ? host.slice(1, -1) : host
}
