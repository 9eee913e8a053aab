import { createProfile, type ShadowsocksProfile } from "../profile/types.js"
import {
  decodeBase64,
  decodeHashTag,
  encodeBase64Url,
  formatFragment,
  formatHostPort,
  formatQuery,
  parseLinkUrl,
  splitAtFirst,
  splitAtLast
} from "./encoding.js"

const AEAD_2022_PREFIX = "2022-"

function parseHostPort(hp: string): { host: string; port: number } | null {
  const s = hp.trim()
  let host = ""
  let portRaw = ""
  if (s.startsWith("[")) {
    const close = s.indexOf("]")
    if (close < 0) return null
    host = s.slice(1, close)
    portRaw = s.slice(close + 1).replace(/^:/, "")
  } else {
    const parts = splitAtLast(s, ":")
    host = parts[0]
    portRaw = parts[1]
  }
  const port = Number(portRaw)
  if (!host || !Number.isInteger(port) || port <= 0 || port > 65535) return null
  return { host, port }
}

/** `ss://base64(method:password@host:port)#name` */
function parseWholeBase64(body: string, name: string): ShadowsocksProfile | null {
  const decoded = decodeBase64(body)
  if (!decoded || !decoded.includes("@")) return null
  const [userinfo, hostport] = splitAtLast(decoded, "@")
  const [method, password] = splitAtFirst(userinfo, ":")
  const hp = parseHostPort(hostport)
  if (!hp || !method || !password) return null

  const p = createProfile("shadowsocks")
  p.name = name
  p.serverAddress = hp.host
  p.serverPort = hp.port
  p.method = method
  p.password = password
  return p
}

/** SIP002: `ss://base64(method:password)@host:port` or `ss://method:password@host:port`. */
function parseUrlForm(link: string): ShadowsocksProfile | null {
  const u = parseLinkUrl(link)
  if (!u || !u.host || !u.port) return null

  let method = ""
  let password = ""
  if (u.password) {
    method = u.username
    password = method.startsWith(AEAD_2022_PREFIX) ? u.password : decodeBase64(u.password) ?? u.password
  } else {
    const decoded = decodeBase64(u.username)
    if (!decoded) return null
    const parts = splitAtFirst(decoded, ":")
    method = parts[0]
    password = parts[1]
  }
  if (!method || !password) return null

  const p = createProfile("shadowsocks")
  p.name = u.name
  p.serverAddress = u.host
  p.serverPort = u.port
  p.method = method
  p.password = password
  p.plugin = u.params.get("plugin") || ""
  const uot = Number.parseInt(u.params.get("uot") || "", 10)
  p.uotVersion = Number.isInteger(uot) && uot > 0 ? uot : 0
  return p
}

export function parseShadowsocks(link: string): ShadowsocksProfile | null {
  const trimmed = String(link || "").trim()
  if (!/^ss:\/\//i.test(trimmed)) return null
  const { base, tag } = decodeHashTag(trimmed.slice("ss://".length))
  const [body] = splitAtFirst(base, "?")
  if (!body.includes("@")) {
    const whole = parseWholeBase64(body, tag)
    if (whole) return whole
  }
  return parseUrlForm(trimmed)
}

export function serializeShadowsocks(p: ShadowsocksProfile): string {
  const userinfo = p.method.startsWith(AEAD_2022_PREFIX)
    ? `${encodeURIComponent(p.method)}:${encodeURIComponent(p.password)}`
    : encodeBase64Url(`${p.method}:${p.password}`)
  const q = new URLSearchParams()
  if (p.plugin) q.set("plugin", p.plugin)
  if (p.uotVersion > 0) q.set("uot", String(p.uotVersion))
  return `ss://${userinfo}@${formatHostPort(p.serverAddress, p.serverPort)}${formatQuery(q)}${formatFragment(p.name)}`
}
