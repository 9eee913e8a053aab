import yaml from "js-yaml"
import { readTextOrNull } from "../utils/fs.js"
import { createLogger } from "../utils/log.js"
import {
  CORE_ARG_STYLES,
  isValidDnsUrl,
  ROUTING_MODES,
  SettingsSchema,
  type RoutingSettings,
  type Settings,
  type VpnSettings
} from "./settings.schema.js"

const log = createLogger("settings")

export type Env = Record<string, string | undefined>

export function toInt(v: string | undefined, fallback: number): number {
  if (v == null || v.trim() === "") return fallback
  const n = Number(v)
  return Number.isFinite(n) ? Math.trunc(n) : fallback
}

export function toBool(v: string | undefined, fallback = false): boolean {
  if (v == null || v === "") return fallback
  const s = String(v).trim().toLowerCase()
  if (["1", "true", "yes", "y", "on"].includes(s)) return true
  if (["0", "false", "no", "n", "off"].includes(s)) return false
  return fallback
}

function oneOf<T extends string>(values: readonly T[], v: string | undefined, fallback: T): T {
  const s = String(v ?? "").trim()
  for (const value of values) if (value === s) return value
  if (s) log.warn(`ignoring unknown value "${s}", expected one of ${values.join("|")}`)
  return fallback
}

export function defaultSettings(): Settings {
  return SettingsSchema.parse({})
}

/** Parses YAML text into settings. Unknown keys are dropped; invalid values throw. */
export function parseSettings(text: string): Settings {
  const raw: unknown = yaml.load(text)
  const res = SettingsSchema.safeParse(raw ?? {})
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    throw new Error(`invalid settings: ${issues.join("; ")}`)
  }
  return res.data
}

export function applyEnvOverrides(s: Settings, env: Env = process.env): Settings {
  const out = structuredClone(s)
  out.inbound.listen = env.LINKBOX_INBOUND_LISTEN || out.inbound.listen
  const port = toInt(env.LINKBOX_INBOUND_PORT, out.inbound.port)
  if (port >= 1 && port <= 65535) out.inbound.port = port

  out.core.binary = env.LINKBOX_CORE_BIN || out.core.binary
  out.core.args = oneOf(CORE_ARG_STYLES, env.LINKBOX_CORE_ARGS, out.core.args)
  out.core.apiAddr = env.LINKBOX_API_ADDR || out.core.apiAddr
  out.core.apiSecret = env.LINKBOX_API_SECRET ?? out.core.apiSecret

  out.skipCert = toBool(env.LINKBOX_SKIP_CERT, out.skipCert)
  out.routing.mode = oneOf(ROUTING_MODES, env.LINKBOX_ROUTING_MODE, out.routing.mode)
  const dnsUrl = env.LINKBOX_DNS_URL
  if (dnsUrl && isValidDnsUrl(dnsUrl)) out.dns.customUrl = dnsUrl
  else if (dnsUrl) log.warn(`ignoring LINKBOX_DNS_URL "${dnsUrl}": not a usable DNS server URL`)
  out.dns.useProxy = toBool(env.LINKBOX_DNS_PROXY, out.dns.useProxy)

  out.monitoring.enabled = toBool(env.LINKBOX_MONITOR_ENABLED, out.monitoring.enabled)
  out.monitoring.intervalSec = Math.max(1, toInt(env.LINKBOX_MONITOR_INTERVAL_SEC, out.monitoring.intervalSec))
  return out
}

/**
 * Reads `config.yaml` and layers environment overrides on top. A missing
 * file yields the defaults.
 */
export async function loadSettings(filePath: string, env: Env = process.env): Promise<Settings> {
  const text = await readTextOrNull(filePath)
  if (text == null) log.debug(`no settings file at ${filePath}, using defaults`)
  const base = text == null ? defaultSettings() : parseSettings(text)
  return applyEnvOverrides(base, env)
}

export interface ProfileOverrides {
  routing?: Partial<RoutingSettings>
  vpn?: Partial<VpnSettings>
}

/** Per-profile overrides win over the global routing and VPN settings. */
export function withOverrides(s: Settings, o: ProfileOverrides | undefined): Settings {
  if (!o) return s
  return {
    ...s,
    routing: { ...s.routing, ...o.routing },
    vpn: { ...s.vpn, ...o.vpn }
  }
}
