import { createProfile, createTransport, type VmessProfile } from "../profile/types.js"
import {
  decodeBase64,
  decodeHashTag,
  encodeBase64Url,
  formatFragment,
  formatHostPort,
  formatQuery,
  parseLinkUrl
} from "./encoding.js"
import { flag, normalizeNetwork, normalizeSecurity, readStreamParams, writeSecurityParams, writeTransportParams } from "./stream.js"
import { legacyVmessSchema, type LegacyVmess } from "./vmess.schema.js"

function toInt(v: string | number | undefined, fallback: number): number {
  if (v == null || v === "") return fallback
  const n = Number(v)
  return Number.isFinite(n) ? Math.trunc(n) : fallback
}

function isTruthy(v: LegacyVmess["allowInsecure"]): boolean {
  if (v == null || v === "") return false
  if (typeof v === "boolean") return v
  return flag(String(v))
}

function readLegacyJson(payload: string): LegacyVmess | null {
  const decoded = decodeBase64(payload)
  if (!decoded) return null
  let obj: unknown
  try {
    obj = JSON.parse(decoded)
  } catch {
    return null
  }
  const parsed = legacyVmessSchema.safeParse(obj)
  return parsed.success ? parsed.data : null
}

function parseLegacy(payload: string, fallbackName: string): VmessProfile | null {
  const obj = readLegacyJson(payload)
  if (!obj) return null
  const network = normalizeNetwork(obj.net)
  if (!network) return null

  const p = createProfile("vmess")
  p.name = obj.ps || fallbackName
  p.serverAddress = obj.add.trim()
  p.serverPort = toInt(obj.port, 443)
  p.uuid = obj.id.trim()
  p.alterId = toInt(obj.aid, 0)
  if (obj.scy) p.security = obj.scy
  const headerType = obj.type && obj.type !== "none" ? obj.type : ""
  p.transport = createTransport({
    network,
    security: normalizeSecurity(obj.tls ?? "", ""),
    host: obj.host || "",
    path: obj.path || "",
    sni: obj.sni || "",
    alpn: obj.alpn || "",
    allowInsecure: isTruthy(obj.allowInsecure),
    utlsFingerprint: obj.fp || "",
    headerType
  })
  return p.uuid && p.serverAddress ? p : null
}

function parseUrlForm(link: string): VmessProfile | null {
  const u = parseLinkUrl(link)
  if (!u || !u.host) return null
  const transport = readStreamParams(u.params, "tls")
  if (!transport) return null

  const p = createProfile("vmess")
  p.name = u.name
  p.serverAddress = u.host
  p.serverPort = u.port || 443
  p.uuid = u.username.trim()
  p.security = u.params.get("encryption") || "auto"
  p.alterId = toInt(u.params.get("aid") ?? undefined, 0)
  p.transport = transport
  return p.uuid ? p : null
}

/** Legacy base64 JSON is tried first, then the `uuid@host:port?query` form. */
export function parseVmess(link: string): VmessProfile | null {
  const trimmed = String(link || "").trim()
  if (!/^vmess:\/\//i.test(trimmed)) return null
  const { base, tag } = decodeHashTag(trimmed.slice("vmess://".length))
  return parseLegacy(base, tag) ?? parseUrlForm(trimmed)
}

function serializeLegacy(p: VmessProfile): string {
  const t = p.transport
  const obj = {
    v: "2",
    ps: p.name,
    add: p.serverAddress,
    port: String(p.serverPort),
    id: p.uuid,
    aid: String(p.alterId),
    net: t.network,
    host: t.host,
    path: t.path,
    type: t.headerType,
    scy: p.security,
    tls: t.security === "tls" ? "tls" : "",
    sni: t.sni,
    alpn: t.alpn,
    fp: t.utlsFingerprint,
    ...(t.allowInsecure ? { allowInsecure: true } : {})
  }
  return `vmess://${encodeBase64Url(JSON.stringify(obj))}`
}

function serializeUrlForm(p: VmessProfile): string {
  const q = new URLSearchParams()
  q.set("encryption", p.security)
  if (p.alterId > 0) q.set("aid", String(p.alterId))
  writeSecurityParams(p.transport, q)
  writeTransportParams(p.transport, q)
  return `vmess://${encodeURIComponent(p.uuid)}@${formatHostPort(p.serverAddress, p.serverPort)}${formatQuery(q)}${formatFragment(p.name)}`
}

export function serializeVmess(p: VmessProfile, { legacy = false }: { legacy?: boolean } = {}): string {
  return legacy ? serializeLegacy(p) : serializeUrlForm(p)
}
