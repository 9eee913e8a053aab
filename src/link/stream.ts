import {
  createTransport,
  isTransportNetwork,
  type TransportNetwork,
  type TransportSecurity,
  type TransportSettings
} from "../profile/types.js"

const DEFAULT_EARLY_DATA_HEADER = createTransport().wsEarlyData.headerName

export function normalizeNetwork(raw: string | null | undefined): TransportNetwork | null {
  const v = String(raw ?? "").trim().toLowerCase()
  if (!v) return "tcp"
  if (v === "h2" || v === "xhttp") return "http"
  return isTransportNetwork(v) ? v : null
}

/** `reality` folds into `tls`; the reality key material is kept on its own. */
export function normalizeSecurity(raw: string | null | undefined, fallback: TransportSecurity): TransportSecurity {
  if (raw == null) return fallback
  const v = raw.trim().toLowerCase()
  if (v === "reality" || v === "tls" || v === "xtls") return "tls"
  if (v === "none" || v === "") return ""
  return fallback
}

export function flag(v: string | null): boolean {
  if (v == null) return false
  return !["0", "false", "no", "off"].includes(v.trim().toLowerCase())
}

/**
 * Reads the transport and TLS query parameters shared by the URL-form links.
 * Returns null for a network the engine has no transport for.
 */
export function readStreamParams(params: URLSearchParams, defaultSecurity: TransportSecurity): TransportSettings | null {
  const network = normalizeNetwork(params.get("type"))
  if (!network) return null
  const t = createTransport({
    network,
    security: normalizeSecurity(params.get("security"), defaultSecurity),
    sni: params.get("sni") || params.get("peer") || "",
    alpn: params.get("alpn") || "",
    allowInsecure: flag(params.get("allowInsecure")),
    utlsFingerprint: params.get("fp") || "",
    reality: {
      publicKey: params.get("pbk") || "",
      shortId: params.get("sid") || "",
      spiderX: params.get("spx") || ""
    }
  })

  if (network === "ws" || network === "httpupgrade") {
    t.path = params.get("path") || ""
    t.host = params.get("host") || ""
    if (network === "ws") {
      const ed = Number.parseInt(params.get("ed") || "", 10)
      if (Number.isInteger(ed) && ed > 0) {
        t.wsEarlyData = { length: ed, headerName: params.get("eh") || t.wsEarlyData.headerName }
      }
    }
  } else if (network === "http") {
    t.path = params.get("path") || ""
    t.host = (params.get("host") || "").replace(/\|/g, ",")
  } else if (network === "grpc") {
    t.path = params.get("serviceName") || ""
  } else if (network === "tcp" && params.get("headerType") === "http") {
    t.headerType = "http"
    t.path = params.get("path") || ""
    t.host = params.get("host") || ""
  }
  return t
}

export function writeSecurityParams(t: TransportSettings, q: URLSearchParams): void {
  const security = t.security === "tls" && t.reality.publicKey ? "reality" : t.security
  q.set("security", security || "none")
  if (t.sni) q.set("sni", t.sni)
  if (t.alpn) q.set("alpn", t.alpn)
  if (t.allowInsecure) q.set("allowInsecure", "1")
  if (t.utlsFingerprint) q.set("fp", t.utlsFingerprint)
  if (security === "reality") {
    q.set("pbk", t.reality.publicKey)
    if (t.reality.shortId) q.set("sid", t.reality.shortId)
    if (t.reality.spiderX) q.set("spx", t.reality.spiderX)
  }
}

export function writeTransportParams(t: TransportSettings, q: URLSearchParams): void {
  q.set("type", t.network)
  switch (t.network) {
    case "ws":
      if (t.path) q.set("path", t.path)
      if (t.host) q.set("host", t.host)
      if (t.wsEarlyData.length > 0) {
        q.set("ed", String(t.wsEarlyData.length))
        if (t.wsEarlyData.headerName !== DEFAULT_EARLY_DATA_HEADER) q.set("eh", t.wsEarlyData.headerName)
      }
      break
    case "http":
    case "httpupgrade":
      if (t.path) q.set("path", t.path)
      if (t.host) q.set("host", t.host)
      break
    case "grpc":
      if (t.path) q.set("serviceName", t.path)
      break
    case "tcp":
      if (t.headerType === "http") {
        q.set("headerType", "http")
        if (t.path) q.set("path", t.path)
        if (t.host) q.set("host", t.host)
      }
      break
    default:
      break
  }
}
