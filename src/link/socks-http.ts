import { createProfile, type HttpProfile, type SocksProfile, type SocksVersion } from "../profile/types.js"
import { decodeBase64, formatFragment, formatHostPort, formatQuery, formatUserinfo, parseLinkUrl, splitAtFirst } from "./encoding.js"
import { flag, normalizeSecurity } from "./stream.js"

const SOCKS_SCHEMES: Record<string, SocksVersion> = {
  socks4a: "4a",
  socks4: "4",
  socks: "5",
  socks5: "5"
}

export function parseSocks(link: string): SocksProfile | null {
  const u = parseLinkUrl(link)
  if (!u || !u.host) return null
  const version = SOCKS_SCHEMES[u.scheme]
  if (!version) return null

  const p = createProfile("socks")
  p.version = version
  p.name = u.name
  p.serverAddress = u.host
  p.serverPort = u.port || 1080
  p.username = u.username
  p.password = u.password

  // Older clients put base64("user:pass") in the username slot.
  if (!p.password && p.username) {
    const decoded = decodeBase64(p.username)
    if (decoded && decoded.includes(":")) {
      const [user, pass] = splitAtFirst(decoded, ":")
      p.username = user
      p.password = pass
    }
  }

  p.transport.security = normalizeSecurity(u.params.get("security"), "")
  p.transport.sni = u.params.get("sni") || ""
  p.transport.allowInsecure = flag(u.params.get("allowInsecure"))
  return p
}

export function parseHttp(link: string): HttpProfile | null {
  const u = parseLinkUrl(link)
  if (!u || !u.host) return null
  if (u.scheme !== "http" && u.scheme !== "https") return null

  const p = createProfile("http")
  p.name = u.name
  p.serverAddress = u.host
  p.serverPort = u.port || 443
  p.username = u.username
  p.password = u.password
  p.transport.security = normalizeSecurity(u.params.get("security"), u.scheme === "https" ? "tls" : "")
  p.transport.sni = u.params.get("sni") || ""
  p.transport.allowInsecure = flag(u.params.get("allowInsecure"))
  return p
}

function tlsQuery(p: SocksProfile | HttpProfile, schemeImpliesTls: boolean): string {
  const q = new URLSearchParams()
  if (p.transport.security === "tls" && !schemeImpliesTls) q.set("security", "tls")
  if (p.transport.sni) q.set("sni", p.transport.sni)
  if (p.transport.allowInsecure) q.set("allowInsecure", "1")
  return formatQuery(q)
}

export function serializeSocks(p: SocksProfile): string {
  const scheme = p.version === "4" ? "socks4" : p.version === "4a" ? "socks4a" : "socks5"
  return `${scheme}://${formatUserinfo(p.username, p.password)}${formatHostPort(p.serverAddress, p.serverPort)}${tlsQuery(p, false)}${formatFragment(p.name)}`
}

export function serializeHttp(p: HttpProfile): string {
  const tls = p.transport.security === "tls"
  const scheme = tls ? "https" : "http"
  return `${scheme}://${formatUserinfo(p.username, p.password)}${formatHostPort(p.serverAddress, p.serverPort)}${tlsQuery(p, tls)}${formatFragment(p.name)}`
}
