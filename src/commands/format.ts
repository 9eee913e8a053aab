import type { ProfileEntry, ProfileGroup } from "../profile/profile.schema.js"
import { displayAddress, displayName, proxyTypeLabel, type ProxyProfile } from "../profile/types.js"
import { c } from "../utils/log.js"

export function describeProfile(p: ProxyProfile): string {
  const t = p.transport
  const extras = [t.network !== "tcp" ? t.network : "", t.security].filter(Boolean).join("+")
  return `${proxyTypeLabel(p)} ${displayName(p)} ${displayAddress(p)}${extras ? ` [${extras}]` : ""}`
}

export function formatEntry(e: ProfileEntry): string {
  const latency = e.latencyMs >= 0 ? ` ${e.latencyMs}ms` : ""
  return `${String(e.id).padStart(4)}  ${describeProfile(e.profile)}${latency}`
}

export function formatGroupHeader(g: ProfileGroup, count: number): string {
  const sub = g.subscriptionUrl ? c.gray(` <- ${g.subscriptionUrl}`) : ""
  return `${c.bold(`#${g.id} ${g.name}`)} (${count})${sub}`
}

/** A plain positive integer names a stored profile; anything else is null. */
export function parseProfileId(arg: string): number | null {
  if (!/^\d+$/.test(arg)) return null
  const id = Number(arg)
  return Number.isSafeInteger(id) && id > 0 ? id : null
}

export function parsePort(arg: string | undefined): number | null {
  if (arg == null || arg === "") return null
  const n = Number(arg)
  if (!Number.isInteger(n) || n < 1 || n > 65535) throw new Error(`invalid port: ${arg}`)
  return n
}
