import { isIpAddress } from "../profile/types.js"
import { isValidDnsUrl, type DnsProvider, type DnsSettings } from "../settings/settings.schema.js"
import { createLogger } from "../utils/log.js"
import type { DnsRule, DnsServer, RunConfig } from "./singbox.js"

export const DNS_PROVIDER_URLS: Record<DnsProvider, string> = {
  system: "local",
  google: "https://dns.google/dns-query",
  cloudflare: "https://cloudflare-dns.com/dns-query",
  adguard: "https://dns.adguard.com/dns-query"
}

export const DNS_TAGS = { main: "main-dns", local: "local-dns", vpn: "vpn-dns" } as const

const log = createLogger("dns")

/** The custom URL wins over the provider preset unless it cannot be used. */
export function dnsUrlFor(dns: DnsSettings): string {
  const custom = dns.customUrl.trim()
  if (custom && !isValidDnsUrl(custom)) {
    log.warn(`unusable DNS URL "${custom}", using the ${dns.provider} preset`)
    return DNS_PROVIDER_URLS[dns.provider]
  }
  return custom || DNS_PROVIDER_URLS[dns.provider]
}

function splitHostPort(s: string, defaultPort: number): { host: string; port: number } {
  const m = /^\[([^\]]+)\](?::(\d+))?$/.exec(s) ?? /^([^:]+)(?::(\d+))?$/.exec(s)
  if (!m) return { host: s, port: defaultPort }
  return { host: m[1] ?? s, port: m[2] ? Number(m[2]) : defaultPort }
}

/**
 * Turns a resolver URL into a sing-box DNS server: `local`, `https://`
 * (DoH), `tls://` (DoT), or a plain host optionally prefixed with
 * `udp://`/`tcp://`.
 */
export function parseDnsServer(url: string, tag: string, detour?: string): DnsServer {
  const raw = url.trim()
  const withDetour = (s: DnsServer): DnsServer => (detour ? { ...s, detour } : s)
  if (!raw || raw === "local") return withDetour({ tag, type: "local" })

  if (/^https:\/\//i.test(raw)) {
    const u = new URL(raw)
    return withDetour({
      tag,
      type: "https",
      server: u.hostname.replace(/^\[|\]$/g, ""),
      server_port: u.port ? Number(u.port) : 443,
      path: u.pathname && u.pathname !== "/" ? u.pathname : "/dns-query"
    })
  }

  if (/^tls:\/\//i.test(raw)) {
    const { host, port } = splitHostPort(raw.slice("tls://".length), 853)
    return withDetour({ tag, type: "tls", server: host, server_port: port })
  }

  const type = /^tcp:\/\//i.test(raw) ? "tcp" : "udp"
  const { host, port } = splitHostPort(raw.replace(/^(udp|tcp):\/\//i, ""), 53)
  const server: DnsServer = { tag, type, server: host }
  if (port !== 53) server.server_port = port
  return withDetour(server)
}

/**
 * Pulls an IPv4 address (and optional port) out of whatever NetworkManager
 * reports, e.g. `IP4.DNS[1]:10.0.0.53:53`.
 */
export function extractIpv4Endpoint(raw: string): { server: string; port: number } | null {
  const m = /(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})(?::(\d+))?/.exec(raw)
  if (!m || !m[1]) return null
  return { server: m[1], port: m[2] ? Number(m[2]) : 53 }
}

export interface DnsBlockInput {
  dns: DnsSettings
  proxyTag: string
  /** Address of the proxy server; hostnames get pinned to the local resolver. */
  proxyServer: string
  vpn: { outboundTag: string; servers: string[]; domains: string[] } | null
}

export function buildDnsBlock(input: DnsBlockInput): RunConfig["dns"] {
  const { dns, proxyTag, proxyServer, vpn } = input
  const servers: DnsServer[] = [
    parseDnsServer(dnsUrlFor(dns), DNS_TAGS.main, dns.useProxy ? proxyTag : "direct"),
    { tag: DNS_TAGS.local, type: "local" }
  ]
  const rules: DnsRule[] = []

  if (vpn && vpn.domains.length) {
    const endpoint = vpn.servers.map(extractIpv4Endpoint).find((e) => e != null)
    servers.push(
      endpoint
        ? { tag: DNS_TAGS.vpn, type: "udp", server: endpoint.server, server_port: endpoint.port, detour: vpn.outboundTag }
        : { tag: DNS_TAGS.vpn, type: "local", detour: vpn.outboundTag }
    )
    rules.push({ domain_suffix: [...vpn.domains], server: DNS_TAGS.vpn })
  }

  // The proxy's own hostname must not resolve through the proxy.
  if (proxyServer && !isIpAddress(proxyServer)) {
    rules.push({ domain: [proxyServer], server: DNS_TAGS.local })
  }

  return { servers, rules, final: DNS_TAGS.main }
}
