import path from "node:path"
import type { DnsSettings, InboundSettings, RoutingSettings, RuleGroup, VpnSettings } from "../settings/settings.schema.js"
import { RULE_GROUPS } from "../settings/settings.schema.js"
import { readTextOrNull } from "../utils/fs.js"
import { createLogger } from "../utils/log.js"
import { buildDnsBlock } from "./dns.js"
import type { DirectOutbound, Outbound, ProxyOutbound, RouteRule, RunConfig } from "./singbox.js"
import type { VpnStatusProvider } from "./vpn.js"

const log = createLogger("route")

export const LOCAL_NETWORKS: readonly string[] = [
  "127.0.0.0/8",
  "10.0.0.0/8",
  "172.16.0.0/12",
  "192.168.0.0/16",
  "169.254.0.0/16",
  "::1/128",
  "fc00::/7",
  "fe80::/10"
]

export const DEFAULT_PROXY_TAG = "proxy"
export const DIRECT_TAG = "direct"
export const VPN_TAG = "vpn"

export interface RouteEntries {
  domains: string[]
  ips: string[]
}

/**
 * Splits list entries into domain suffixes and IP/CIDR ranges. Entries may
 * hold several comma-joined values; a bare IPv4 address becomes a /32.
 */
export function parseRouteEntries(entries: readonly string[]): RouteEntries {
  const out: RouteEntries = { domains: [], ips: [] }
  for (const raw of entries) {
    for (const part of raw.split(",")) {
      const entry = part.trim()
      if (!entry) continue
      const slash = entry.split("/")
      if (slash.length === 2 && /^\d+$/.test(slash[1] ?? "")) {
        out.ips.push(entry)
      } else if (/^\d[\d.]*$/.test(entry)) {
        out.ips.push(`${entry}/32`)
      } else {
        out.domains.push(entry)
      }
    }
  }
  return out
}

/** Reads a newline-delimited list; `#` comments and blank lines are skipped. */
export async function loadListFile(filePath: string): Promise<string[]> {
  const text = await readTextOrNull(filePath)
  if (text == null) return []
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l && !l.startsWith("#"))
}

export interface RoutingLists {
  proxy: string[]
  direct: string[]
  vpn: string[]
}

export function emptyLists(): RoutingLists {
  return { proxy: [], direct: [], vpn: [] }
}

/** Loads the custom-mode lists; relative names resolve against `dir`. */
export async function loadRoutingLists(dir: string, routing: RoutingSettings): Promise<RoutingLists> {
  const resolve = (p: string) => (path.isAbsolute(p) ? p : path.join(dir, p))
  const [proxy, direct, vpn] = await Promise.all([
    loadListFile(resolve(routing.proxyList)),
    loadListFile(resolve(routing.directList)),
    loadListFile(resolve(routing.vpnList))
  ])
  return { proxy, direct, vpn }
}

function isRuleGroup(v: string): v is RuleGroup {
  return RULE_GROUPS.some((g) => g === v)
}

/** Known groups in the configured order, deduplicated, with missing ones appended. */
export function normalizeRuleOrder(order: readonly string[]): RuleGroup[] {
  const out: RuleGroup[] = []
  for (const g of [...order, ...RULE_GROUPS]) {
    if (isRuleGroup(g) && !out.includes(g)) out.push(g)
  }
  return out
}

function pushRules(rules: RouteRule[], entries: RouteEntries, outbound: string): void {
  if (entries.ips.length) rules.push({ ip_cidr: entries.ips, outbound })
  if (entries.domains.length) rules.push({ domain_suffix: entries.domains, outbound })
}

interface VpnBinding {
  iface: string
  directIface: string | null
  dnsServers: string[]
}

async function resolveVpn(vpn: VpnSettings, status: VpnStatusProvider): Promise<VpnBinding | null> {
  if (!vpn.enabled) return null
  const name = vpn.connectionName.trim()
  if (!name || !(await status.isActive(name))) {
    log.warn(`vpn connection "${name}" is not active, routing without it`)
    return null
  }
  const iface = vpn.interfaceName.trim() || (await status.getInterface(name))
  if (!iface) {
    log.warn(`vpn connection "${name}" is active but no interface was found`)
    return null
  }
  const directIface = vpn.directInterface.trim() || (await status.getDefaultInterface(iface))
  const dnsServers = await status.getDnsServers(name)
  log.info(`vpn via ${iface}, direct via ${directIface ?? "default route"}`)
  return { iface, directIface, dnsServers }
}

export interface AssembleInput {
  outbound: ProxyOutbound
  routing: RoutingSettings
  vpn: VpnSettings
  dns: DnsSettings
  inbound: InboundSettings
  /** Custom-mode lists; see `loadRoutingLists`. */
  lists?: RoutingLists
  logLevel?: string
}

/**
 * Assembles the full run configuration. Rule order: VPN networks, local
 * bypass (unless proxy-all), then the custom lists in `ruleOrder`; anything
 * unmatched goes to the proxy. The VPN status lookup is the only side effect.
 */
export async function buildRunConfig(input: AssembleInput, vpnStatus: VpnStatusProvider): Promise<RunConfig> {
  const { routing, vpn, dns, inbound } = input
  const proxyTag = input.outbound.tag || DEFAULT_PROXY_TAG
  const proxy: ProxyOutbound = { ...input.outbound, tag: proxyTag }
  const lists = input.lists ?? emptyLists()

  const binding = await resolveVpn(vpn, vpnStatus)
  const rules: RouteRule[] = []
  const vpnDomains: string[] = []

  if (binding) {
    const overVpn = parseRouteEntries([...vpn.overVpnNetworks, ...vpn.overVpnDomains])
    pushRules(rules, overVpn, VPN_TAG)
    vpnDomains.push(...overVpn.domains)
  }

  if (routing.mode !== "proxy-all") {
    rules.push({ ip_cidr: [...LOCAL_NETWORKS], outbound: DIRECT_TAG })
  }

  if (routing.mode === "custom") {
    for (const group of normalizeRuleOrder(routing.ruleOrder)) {
      if (group === "direct") pushRules(rules, parseRouteEntries(lists.direct), DIRECT_TAG)
      else if (group === "proxy") pushRules(rules, parseRouteEntries(lists.proxy), proxyTag)
      else if (binding) {
        const entries = parseRouteEntries(lists.vpn)
        pushRules(rules, entries, VPN_TAG)
        vpnDomains.push(...entries.domains)
      }
    }
  }

  const direct: DirectOutbound = { type: "direct", tag: DIRECT_TAG }
  if (binding?.directIface) direct.bind_interface = binding.directIface
  const outbounds: Outbound[] = [proxy, direct]
  if (binding) outbounds.push({ type: "direct", tag: VPN_TAG, bind_interface: binding.iface })

  log.debug(`assembled ${rules.length} route rules, mode=${routing.mode}, final=${proxyTag}`)

  return {
    log: { level: input.logLevel ?? "warn", timestamp: true },
    dns: buildDnsBlock({
      dns,
      proxyTag,
      proxyServer: proxy.server,
      vpn: binding ? { outboundTag: VPN_TAG, servers: binding.dnsServers, domains: vpnDomains } : null
    }),
    inbounds: [{ type: "mixed", tag: "mixed-in", listen: inbound.listen, listen_port: inbound.port, sniff: inbound.sniff }],
    outbounds,
    route: { rules, final: proxyTag, auto_detect_interface: false }
  }
}
