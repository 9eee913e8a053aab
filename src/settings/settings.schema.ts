import { z } from "zod"

export const ROUTING_MODES = ["proxy-all", "bypass-local", "custom"] as const
export const RULE_GROUPS = ["direct", "vpn", "proxy"] as const
export const DNS_PROVIDERS = ["system", "google", "cloudflare", "adguard"] as const
export const CORE_ARG_STYLES = ["run-c", "config"] as const

export type RoutingMode = (typeof ROUTING_MODES)[number]
export type RuleGroup = (typeof RULE_GROUPS)[number]
export type DnsProvider = (typeof DNS_PROVIDERS)[number]
export type CoreArgStyle = (typeof CORE_ARG_STYLES)[number]

const port = z.number().int().min(1).max(65535)

/**
 * Accepts what the DNS block builder understands: empty, `local`, an
 * `https://` URL with a host, or a host optionally prefixed with
 * `tls://`, `udp://` or `tcp://`.
 */
export function isValidDnsUrl(raw: string): boolean {
  const s = raw.trim()
  if (!s || s === "local") return true
  if (/^https:\/\//i.test(s)) {
    try {
      return new URL(s).hostname !== ""
    } catch {
      return false
    }
  }
  const host = s.replace(/^(tls|udp|tcp):\/\//i, "")
  return host !== "" && !host.includes("/")
}
const stringList = z.array(z.string()).default([])

export const InboundSettingsSchema = z.object({
  listen: z.string().default("127.0.0.1"),
  port: port.default(2080),
  sniff: z.boolean().default(true)
})

export const CoreSettingsSchema = z.object({
  /** Empty means: look for `sing-box` in the bundled dir, then PATH. */
  binary: z.string().default(""),
  args: z.enum(CORE_ARG_STYLES).default("run-c"),
  logLevel: z.string().default("warn"),
  logFile: z.string().default(""),
  apiAddr: z.string().default("127.0.0.1:9090"),
  apiSecret: z.string().default(""),
  settleMs: z.number().int().min(0).default(500),
  readyTimeoutMs: z.number().int().min(0).default(5000),
  stopTimeoutMs: z.number().int().min(0).default(5000)
})

export const RoutingSettingsSchema = z.object({
  mode: z.enum(ROUTING_MODES).default("bypass-local"),
  proxyList: z.string().default("proxy_list.txt"),
  directList: z.string().default("direct_list.txt"),
  vpnList: z.string().default("vpn_list.txt"),
  ruleOrder: z.array(z.string()).default([...RULE_GROUPS])
})

export const VpnSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  connectionName: z.string().default(""),
  /** Overrides interface auto-detection. */
  interfaceName: z.string().default(""),
  directInterface: z.string().default(""),
  overVpnNetworks: stringList,
  overVpnDomains: stringList
})

export const DnsSettingsSchema = z.object({
  provider: z.enum(DNS_PROVIDERS).default("system"),
  customUrl: z.string().refine(isValidDnsUrl, { message: "not a usable DNS server URL" }).default(""),
  useProxy: z.boolean().default(true)
})

export const MonitoringSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  intervalSec: z.number().int().min(1).default(30),
  testUrl: z.string().default("https://www.gstatic.com/generate_204")
})

export const SubscriptionSettingsSchema = z.object({
  userAgent: z.string().default("linkbox/0.1"),
  timeoutMs: z.number().int().min(1000).default(15_000),
  maxAttempts: z.number().int().min(1).default(4),
  insecure: z.boolean().default(false),
  httpProxy: z.string().default(""),
  cacheDir: z.string().default(""),
  useCacheOnFail: z.boolean().default(true)
})

export const SettingsSchema = z.object({
  inbound: InboundSettingsSchema.default({}),
  core: CoreSettingsSchema.default({}),
  routing: RoutingSettingsSchema.default({}),
  vpn: VpnSettingsSchema.default({}),
  dns: DnsSettingsSchema.default({}),
  monitoring: MonitoringSettingsSchema.default({}),
  subscription: SubscriptionSettingsSchema.default({}),
  skipCert: z.boolean().default(false)
})

export type InboundSettings = z.output<typeof InboundSettingsSchema>
export type CoreSettings = z.output<typeof CoreSettingsSchema>
export type RoutingSettings = z.output<typeof RoutingSettingsSchema>
export type VpnSettings = z.output<typeof VpnSettingsSchema>
export type DnsSettings = z.output<typeof DnsSettingsSchema>
export type MonitoringSettings = z.output<typeof MonitoringSettingsSchema>
export type SubscriptionSettings = z.output<typeof SubscriptionSettingsSchema>
export type Settings = z.output<typeof SettingsSchema>
export type SettingsInput = z.input<typeof SettingsSchema>
