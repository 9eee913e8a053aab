import type { ProfileOf, ProxyKind, ProxyProfile } from "../profile/types.js"
import { errorMessage } from "../utils/log.js"
import type {
  HttpOutbound,
  ProxyOutbound,
  ShadowsocksOutbound,
  SocksOutbound,
  TrojanOutbound,
  VlessOutbound,
  VmessOutbound
} from "./singbox.js"
import { compileTls, compileTransport } from "./transport.js"

export interface CompileResult {
  outbound: ProxyOutbound | null
  /** Empty when compilation succeeded. */
  error: string
}

type Builder<K extends ProxyKind> = (p: ProfileOf<K>, skipCert: boolean) => ProxyOutbound

function requireServer(p: ProxyProfile): { server: string; server_port: number } {
  const server = p.serverAddress.trim()
  if (!server) throw new Error(`${p.kind} profile has no server address`)
  if (!Number.isInteger(p.serverPort) || p.serverPort <= 0 || p.serverPort > 65535) {
    throw new Error(`${p.kind} profile has invalid port ${p.serverPort}`)
  }
  return { server, server_port: p.serverPort }
}

function withTag<T extends ProxyOutbound>(p: ProxyProfile, outbound: T): T {
  return p.name ? { ...outbound, tag: p.name } : outbound
}

function normalizeFlow(flow: string): string {
  const f = flow.trim()
  if (f === "none") return ""
  return f.endsWith("-udp443") ? f.slice(0, -"-udp443".length) : f
}

function buildVless(p: ProfileOf<"vless">, skipCert: boolean): VlessOutbound {
  const uuid = p.uuid.trim()
  if (!uuid) throw new Error("vless profile has no uuid")
  const out: VlessOutbound = { type: "vless", ...requireServer(p), uuid, packet_encoding: p.transport.packetEncoding || "xudp" }
  const flow = normalizeFlow(p.flow)
  if (flow) out.flow = flow
  const transport = compileTransport(p.transport)
  if (transport) out.transport = transport
  const tls = compileTls(p.transport, skipCert)
  if (tls) out.tls = tls
  return withTag(p, out)
}

function buildVmess(p: ProfileOf<"vmess">, skipCert: boolean): VmessOutbound {
  const uuid = p.uuid.trim()
  if (!uuid) throw new Error("vmess profile has no uuid")
  const out: VmessOutbound = {
    type: "vmess",
    ...requireServer(p),
    uuid,
    security: p.security || "auto",
    alter_id: p.alterId,
    packet_encoding: p.transport.packetEncoding || "xudp"
  }
  const transport = compileTransport(p.transport)
  if (transport) out.transport = transport
  const tls = compileTls(p.transport, skipCert)
  if (tls) out.tls = tls
  return withTag(p, out)
}

function buildTrojan(p: ProfileOf<"trojan">, skipCert: boolean): TrojanOutbound {
  if (!p.password) throw new Error("trojan profile has no password")
  const out: TrojanOutbound = { type: "trojan", ...requireServer(p), password: p.password }
  const transport = compileTransport(p.transport)
  if (transport) out.transport = transport
  const tls = compileTls(p.transport, skipCert)
  if (tls) out.tls = tls
  return withTag(p, out)
}

function buildShadowsocks(p: ProfileOf<"shadowsocks">): ShadowsocksOutbound {
  if (!p.method || !p.password) throw new Error("shadowsocks profile needs method and password")
  const out: ShadowsocksOutbound = {
    type: "shadowsocks",
    ...requireServer(p),
    method: p.method,
    password: p.password,
    udp_over_tcp: p.uotVersion > 0 ? { enabled: true, version: p.uotVersion } : false
  }
  const plugin = p.plugin.trim()
  if (plugin) {
    const sep = plugin.indexOf(";")
    out.plugin = sep < 0 ? plugin : plugin.slice(0, sep)
    if (sep >= 0) out.plugin_opts = plugin.slice(sep + 1)
  }
  return withTag(p, out)
}

function buildSocks(p: ProfileOf<"socks">): SocksOutbound {
  const out: SocksOutbound = { type: "socks", ...requireServer(p) }
  if (p.version === "4" || p.version === "4a") out.version = p.version
  if (p.username && p.password) {
    out.username = p.username
    out.password = p.password
  }
  return withTag(p, out)
}

function buildHttp(p: ProfileOf<"http">, skipCert: boolean): HttpOutbound {
  const out: HttpOutbound = { type: "http", ...requireServer(p) }
  if (p.username && p.password) {
    out.username = p.username
    out.password = p.password
  }
  const tls = compileTls(p.transport, skipCert)
  if (tls) out.tls = tls
  return withTag(p, out)
}

const builders: { [K in ProxyKind]: Builder<K> } = {
  vless: buildVless,
  vmess: buildVmess,
  trojan: buildTrojan,
  shadowsocks: buildShadowsocks,
  socks: buildSocks,
  http: buildHttp
}

function buildAs<K extends ProxyKind>(kind: K, p: ProfileOf<K>, skipCert: boolean): ProxyOutbound {
  const build: Builder<K> = builders[kind]
  return build(p, skipCert)
}

/**
 * Compiles a profile into a sing-box outbound. Failures are reported in
 * `error`; callers check it before using `outbound`. The tag is the profile
 * name when there is one; otherwise the caller assigns it.
 */
export function compileOutbound(profile: ProxyProfile, skipCert = false): CompileResult {
  try {
    return { outbound: buildAs(profile.kind, profile, skipCert), error: "" }
  } catch (e) {
    return { outbound: null, error: errorMessage(e) }
  }
}
