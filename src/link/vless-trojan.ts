import { createProfile, type TrojanProfile, type VlessProfile } from "../profile/types.js"
import { formatFragment, formatHostPort, formatQuery, parseLinkUrl } from "./encoding.js"
import { readStreamParams, writeSecurityParams, writeTransportParams } from "./stream.js"

export function parseVless(link: string): VlessProfile | null {
  const u = parseLinkUrl(link)
  if (!u || u.scheme !== "vless" || !u.host) return null
  const transport = readStreamParams(u.params, "")
  if (!transport) return null

  const p = createProfile("vless")
  p.name = u.name
  p.serverAddress = u.host
  p.serverPort = u.port || 443
  p.uuid = u.username.trim()
  p.encryption = u.params.get("encryption") ?? "none"
  p.flow = u.params.get("flow") || ""
  p.transport = transport
  return p.uuid ? p : null
}

export function parseTrojan(link: string): TrojanProfile | null {
  const u = parseLinkUrl(link)
  if (!u || u.scheme !== "trojan" || !u.host) return null
  const transport = readStreamParams(u.params, "tls")
  if (!transport) return null

  const p = createProfile("trojan")
  p.name = u.name
  p.serverAddress = u.host
  p.serverPort = u.port || 443
  p.password = u.username
  p.transport = transport
  return p.password ? p : null
}

export function serializeVless(p: VlessProfile): string {
  const q = new URLSearchParams()
  writeSecurityParams(p.transport, q)
  writeTransportParams(p.transport, q)
  if (p.flow) q.set("flow", p.flow)
  if (p.encryption && p.encryption !== "none") q.set("encryption", p.encryption)
  return `vless://${encodeURIComponent(p.uuid)}@${formatHostPort(p.serverAddress, p.serverPort)}${formatQuery(q)}${formatFragment(p.name)}`
}

export function serializeTrojan(p: TrojanProfile): string {
  const q = new URLSearchParams()
  writeSecurityParams(p.transport, q)
  writeTransportParams(p.transport, q)
  return `trojan://${encodeURIComponent(p.password)}@${formatHostPort(p.serverAddress, p.serverPort)}${formatQuery(q)}${formatFragment(p.name)}`
}
