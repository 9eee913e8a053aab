import fsp from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { describe, expect, it } from "vitest"
import { defaultSettings } from "../settings/settings.js"
import type { Settings } from "../settings/settings.schema.js"
import { buildDnsBlock, dnsUrlFor, extractIpv4Endpoint, parseDnsServer } from "./dns.js"
import {
  LOCAL_NETWORKS,
  buildRunConfig,
  loadListFile,
  loadRoutingLists,
  normalizeRuleOrder,
  parseRouteEntries,
  type RoutingLists
} from "./route.js"
import type { ProxyOutbound } from "./singbox.js"
import type { VpnStatusProvider } from "./vpn.js"

class FakeVpn implements VpnStatusProvider {
  constructor(
    private readonly active: boolean,
    private readonly iface: string | null = "tun0",
    private readonly dns: string[] = []
  ) {}
  async isActive() {
    return this.active
  }
  async getInterface() {
    return this.iface
  }
  async getDnsServers() {
    return this.dns
  }
  async getDefaultInterface() {
    return "eth0"
  }
}

const outbound: ProxyOutbound = { type: "trojan", server: "edge.example.com", server_port: 443, password: "test-secret" }

function assemble(settings: Settings, vpn: VpnStatusProvider, lists?: RoutingLists) {
  return buildRunConfig(
    { outbound, routing: settings.routing, vpn: settings.vpn, dns: settings.dns, inbound: settings.inbound, lists },
    vpn
  )
}

function vpnSettings(): Settings {
  const s = defaultSettings()
  s.vpn.enabled = true
  s.vpn.connectionName = "corp-vpn"
  s.vpn.overVpnNetworks = ["10.20.0.0/16"]
  return s
}

describe("parseRouteEntries", () => {
  it("classifies ranges, bare addresses and domains", () => {
    expect(parseRouteEntries(["10.0.0.0/8", "1.2.3.4", "example.com", "2001:db8::/32", "a.example.com,b.example.com,"])).toEqual({
      ips: ["10.0.0.0/8", "1.2.3.4/32", "2001:db8::/32"],
      domains: ["example.com", "a.example.com", "b.example.com"]
    })
  })

  it("treats a slash without a numeric suffix as a domain", () => {
    expect(parseRouteEntries(["example.com/x"])).toEqual({ ips: [], domains: ["example.com/x"] })
  })
})

describe("normalizeRuleOrder", () => {
  it("keeps known groups once and appends the missing ones", () => {
    expect(normalizeRuleOrder(["proxy", "bogus", "proxy"])).toEqual(["proxy", "direct", "vpn"])
    expect(normalizeRuleOrder([])).toEqual(["direct", "vpn", "proxy"])
  })
})

describe("list files", () => {
  it("skips comments and blanks and tolerates missing files", async () => {
    const dir = await fsp.mkdtemp(path.join(os.tmpdir(), "linkbox-lists-"))
    try {
      await fsp.writeFile(path.join(dir, "direct_list.txt"), "# lan\n\n192.168.1.10\r\nintranet.example\n", "utf8")
      expect(await loadListFile(path.join(dir, "direct_list.txt"))).toEqual(["192.168.1.10", "intranet.example"])
      const lists = await loadRoutingLists(dir, defaultSettings().routing)
      expect(lists).toEqual({ proxy: [], direct: ["192.168.1.10", "intranet.example"], vpn: [] })
    } finally {
      await fsp.rm(dir, { recursive: true, force: true })
    }
  })
})

describe("buildRunConfig", () => {
  it("places the VPN rule before the local bypass and falls back to the proxy", async () => {
    const cfg = await assemble(vpnSettings(), new FakeVpn(true))
    expect(cfg.route.rules).toEqual([
      { ip_cidr: ["10.20.0.0/16"], outbound: "vpn" },
      { ip_cidr: [...LOCAL_NETWORKS], outbound: "direct" }
    ])
    expect(cfg.route.final).toBe("proxy")
    expect(cfg.outbounds).toEqual([
      { ...outbound, tag: "proxy" },
      { type: "direct", tag: "direct", bind_interface: "eth0" },
      { type: "direct", tag: "vpn", bind_interface: "tun0" }
    ])
  })

  it("routes without the VPN when the connection is down", async () => {
    const cfg = await assemble(vpnSettings(), new FakeVpn(false))
    expect(cfg.route.rules).toEqual([{ ip_cidr: [...LOCAL_NETWORKS], outbound: "direct" }])
    expect(cfg.outbounds.map((o) => o.tag)).toEqual(["proxy", "direct"])
  })

  it("routes without the VPN when no interface resolves", async () => {
    const cfg = await assemble(vpnSettings(), new FakeVpn(true, null))
    expect(cfg.outbounds).toHaveLength(2)
  })

  it("prefers the configured interface names", async () => {
    const s = vpnSettings()
    s.vpn.interfaceName = "wg-corp"
    s.vpn.directInterface = "wlan0"
    const cfg = await assemble(s, new FakeVpn(true, null))
    expect(cfg.outbounds.slice(1)).toEqual([
      { type: "direct", tag: "direct", bind_interface: "wlan0" },
      { type: "direct", tag: "vpn", bind_interface: "wg-corp" }
    ])
  })

  it("emits no local rule in proxy-all mode", async () => {
    const s = defaultSettings()
    s.routing.mode = "proxy-all"
    const cfg = await assemble(s, new FakeVpn(false))
    expect(cfg.route.rules).toEqual([])
    expect(cfg.route.final).toBe("proxy")
  })

  it("orders custom lists by ruleOrder with IPs before domains", async () => {
    const s = defaultSettings()
    s.routing.mode = "custom"
    s.routing.ruleOrder = ["proxy", "direct"]
    const lists: RoutingLists = { proxy: ["blocked.example", "9.9.9.9"], direct: ["bank.example"], vpn: ["corp.example"] }
    const cfg = await assemble(s, new FakeVpn(false), lists)
    expect(cfg.route.rules).toEqual([
      { ip_cidr: [...LOCAL_NETWORKS], outbound: "direct" },
      { ip_cidr: ["9.9.9.9/32"], outbound: "proxy" },
      { domain_suffix: ["blocked.example"], outbound: "proxy" },
      { domain_suffix: ["bank.example"], outbound: "direct" }
    ])
  })

  it("sends vpn list domains to the VPN resolver", async () => {
    const s = vpnSettings()
    s.routing.mode = "custom"
    const lists: RoutingLists = { proxy: [], direct: [], vpn: ["corp.example"] }
    const cfg = await assemble(s, new FakeVpn(true, "tun0", ["IP4.DNS[1]:10.20.0.53"]), lists)
    expect(cfg.route.rules.at(-1)).toEqual({ domain_suffix: ["corp.example"], outbound: "vpn" })
    expect(cfg.dns.servers.at(-1)).toEqual({ tag: "vpn-dns", type: "udp", server: "10.20.0.53", server_port: 53, detour: "vpn" })
    expect(cfg.dns.rules[0]).toEqual({ domain_suffix: ["corp.example"], server: "vpn-dns" })
  })

  it("keeps the outbound's own tag and builds the inbound", async () => {
    const s = defaultSettings()
    const cfg = await buildRunConfig(
      { outbound: { ...outbound, tag: "edge" }, routing: s.routing, vpn: s.vpn, dns: s.dns, inbound: s.inbound, logLevel: "info" },
      new FakeVpn(false)
    )
    expect(cfg.route.final).toBe("edge")
    expect(cfg.log).toEqual({ level: "info", timestamp: true })
    expect(cfg.inbounds).toEqual([{ type: "mixed", tag: "mixed-in", listen: "127.0.0.1", listen_port: 2080, sniff: true }])
    expect(cfg.dns.rules).toEqual([{ domain: ["edge.example.com"], server: "local-dns" }])
  })

  it("does not mutate the outbound", async () => {
    const before = structuredClone(outbound)
    await assemble(defaultSettings(), new FakeVpn(false))
    expect(outbound).toEqual(before)
  })
})

describe("dns", () => {
  it("resolves provider presets and custom URLs", () => {
    const dns = defaultSettings().dns
    expect(dnsUrlFor(dns)).toBe("local")
    expect(dnsUrlFor({ ...dns, provider: "google" })).toBe("https://dns.google/dns-query")
    expect(dnsUrlFor({ ...dns, provider: "google", customUrl: "tls://1.1.1.1" })).toBe("tls://1.1.1.1")
  })

  it("falls back to the provider preset for an unusable custom URL", () => {
    const dns = { ...defaultSettings().dns, provider: "cloudflare" as const, customUrl: "https://" }
    expect(dnsUrlFor(dns)).toBe("https://cloudflare-dns.com/dns-query")
  })

  it("parses resolver URLs", () => {
    expect(parseDnsServer("https://dns.example.com:8443/q", "main-dns", "proxy")).toEqual({
      tag: "main-dns",
      type: "https",
      server: "dns.example.com",
      server_port: 8443,
      path: "/q",
      detour: "proxy"
    })
    expect(parseDnsServer("https://dns.example.com", "m")).toEqual({
      tag: "m",
      type: "https",
      server: "dns.example.com",
      server_port: 443,
      path: "/dns-query"
    })
    expect(parseDnsServer("tls://9.9.9.9", "m")).toEqual({ tag: "m", type: "tls", server: "9.9.9.9", server_port: 853 })
    expect(parseDnsServer("udp://8.8.8.8", "m")).toEqual({ tag: "m", type: "udp", server: "8.8.8.8" })
    expect(parseDnsServer("tcp://8.8.4.4:5353", "m")).toEqual({ tag: "m", type: "tcp", server: "8.8.4.4", server_port: 5353 })
    expect(parseDnsServer("local", "m", "direct")).toEqual({ tag: "m", type: "local", detour: "direct" })
  })

  it("extracts IPv4 endpoints from NetworkManager output", () => {
    expect(extractIpv4Endpoint("IP4.DNS[1]:10.222.0.7:5353")).toEqual({ server: "10.222.0.7", port: 5353 })
    expect(extractIpv4Endpoint("fd00::53")).toBeNull()
  })

  it("falls back to a local resolver over the VPN without DNS servers", () => {
    const block = buildDnsBlock({
      dns: { provider: "cloudflare", customUrl: "", useProxy: false },
      proxyTag: "proxy",
      proxyServer: "1.2.3.4",
      vpn: { outboundTag: "vpn", servers: [], domains: ["corp.example"] }
    })
    expect(block).toEqual({
      servers: [
        {
          tag: "main-dns",
          type: "https",
          server: "cloudflare-dns.com",
          server_port: 443,
          path: "/dns-query",
          detour: "direct"
        },
        { tag: "local-dns", type: "local" },
        { tag: "vpn-dns", type: "local", detour: "vpn" }
      ],
      rules: [{ domain_suffix: ["corp.example"], server: "vpn-dns" }],
      final: "main-dns"
    })
  })
})
