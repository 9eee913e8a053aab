import type { TransportSettings } from "../profile/types.js"
import type { SingboxTls, SingboxTransport } from "./singbox.js"

const EARLY_DATA_HEADER = "Sec-WebSocket-Protocol"

function splitList(s: string): string[] {
  return s.split(",").map((x) => x.trim()).filter(Boolean)
}

function wsTransport(t: TransportSettings): SingboxTransport {
  const out: SingboxTransport = { type: "ws" }
  if (t.host) out.headers = { Host: t.host }

  let path = t.path
  const edAt = path.indexOf("?ed=")
  if (edAt >= 0) {
    const ed = Number.parseInt(path.slice(edAt + 4), 10)
    path = path.slice(0, edAt)
    if (Number.isFinite(ed) && ed > 0) {
      out.max_early_data = ed
      out.early_data_header_name = EARLY_DATA_HEADER
    }
  }
  if (path) out.path = path

  if (t.wsEarlyData.length > 0) {
    out.max_early_data = t.wsEarlyData.length
    out.early_data_header_name = t.wsEarlyData.headerName || EARLY_DATA_HEADER
  }
  return out
}

/**
 * Builds the sing-box `transport` block. Plain TCP has none; TCP with an
 * HTTP header becomes the HTTP-disguise transport.
 */
export function compileTransport(t: TransportSettings): SingboxTransport | null {
  switch (t.network) {
    case "tcp": {
      if (t.headerType !== "http") return null
      const out: SingboxTransport = { type: "http", method: "GET" }
      if (t.path) out.path = t.path
      if (t.host) out.headers = { Host: splitList(t.host) }
      return out
    }
    case "ws":
      return wsTransport(t)
    case "http": {
      const out: SingboxTransport = { type: "http" }
      if (t.path) out.path = t.path
      if (t.host) out.host = splitList(t.host)
      return out
    }
    case "grpc": {
      const out: SingboxTransport = { type: "grpc" }
      if (t.path) out.service_name = t.path
      return out
    }
    case "httpupgrade": {
      const out: SingboxTransport = { type: "httpupgrade" }
      if (t.path) out.path = t.path
      if (t.host) out.host = t.host
      return out
    }
    case "quic":
      return { type: "quic" }
  }
}

export function compileTls(t: TransportSettings, skipCert = false): SingboxTls | null {
  if (t.security !== "tls" && t.security !== "reality") return null
  const tls: SingboxTls = { enabled: true }
  if (t.allowInsecure || skipCert) tls.insecure = true
  const sni = t.sni.trim()
  if (sni) tls.server_name = sni
  const cert = t.certificate.trim()
  if (cert) tls.certificate = cert
  const alpn = splitList(t.alpn)
  if (alpn.length) tls.alpn = alpn

  let fingerprint = t.utlsFingerprint
  const publicKey = t.reality.publicKey.trim()
  if (publicKey) {
    tls.reality = {
      enabled: true,
      public_key: publicKey,
      short_id: (t.reality.shortId.split(",")[0] ?? "").trim()
    }
    // Reality handshakes need a uTLS client hello.
    if (!fingerprint) fingerprint = "random"
  }
  if (fingerprint) tls.utls = { enabled: true, fingerprint }
  return tls
}
