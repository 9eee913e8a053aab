import net from "node:net"

export const NETWORKS = ["tcp", "ws", "http", "grpc", "httpupgrade", "quic"] as const
export type TransportNetwork = (typeof NETWORKS)[number]

export type TransportSecurity = "" | "tls" | "reality"

export const PROXY_KINDS = ["vless", "trojan", "vmess", "shadowsocks", "socks", "http"] as const
export type ProxyKind = (typeof PROXY_KINDS)[number]

export type SocksVersion = "4" | "4a" | "5"

export interface RealitySettings {
  publicKey: string
  /** Raw `sid` value; may hold several comma-separated ids. */
  shortId: string
  spiderX: string
}

export interface WsEarlyData {
  length: number
  headerName: string
}

export interface TransportSettings {
  network: TransportNetwork
  security: TransportSecurity
  path: string
  host: string
  headerType: string
  sni: string
  alpn: string
  allowInsecure: boolean
  certificate: string
  utlsFingerprint: string
  reality: RealitySettings
  wsEarlyData: WsEarlyData
  packetEncoding: string
}

interface ProfileBase {
  name: string
  serverAddress: string
  serverPort: number
  /** Assigned by the owning store; -1 until stored. */
  id: number
  groupId: number
  transport: TransportSettings
}

export interface VlessProfile extends ProfileBase {
  kind: "vless"
  uuid: string
  flow: string
  encryption: string
}

export interface TrojanProfile extends ProfileBase {
  kind: "trojan"
  password: string
}

export interface VmessProfile extends ProfileBase {
  kind: "vmess"
  uuid: string
  alterId: number
  security: string
}

export interface ShadowsocksProfile extends ProfileBase {
  kind: "shadowsocks"
  method: string
  password: string
  plugin: string
  uotVersion: number
}

export interface SocksProfile extends ProfileBase {
  kind: "socks"
  version: SocksVersion
  username: string
  password: string
}

export interface HttpProfile extends ProfileBase {
  kind: "http"
  username: string
  password: string
}

export type ProxyProfile =
  | VlessProfile
  | TrojanProfile
  | VmessProfile
  | ShadowsocksProfile
  | SocksProfile
  | HttpProfile

export type ProfileOf<K extends ProxyKind> = Extract<ProxyProfile, { kind: K }>

export function createTransport(overrides: Partial<TransportSettings> = {}): TransportSettings {
  return {
    network: "tcp",
    security: "",
    path: "",
    host: "",
    headerType: "",
    sni: "",
    alpn: "",
    allowInsecure: false,
    certificate: "",
    utlsFingerprint: "",
    reality: { publicKey: "", shortId: "", spiderX: "" },
    wsEarlyData: { length: 0, headerName: "Sec-WebSocket-Protocol" },
    packetEncoding: "xudp",
    ...overrides
  }
}

function base(port: number, transport: TransportSettings): ProfileBase {
  return { name: "", serverAddress: "", serverPort: port, id: -1, groupId: 0, transport }
}

const factories: { [K in ProxyKind]: () => ProfileOf<K> } = {
  vless: () => ({ ...base(443, createTransport()), kind: "vless", uuid: "", flow: "", encryption: "none" }),
  trojan: () => ({ ...base(443, createTransport({ security: "tls" })), kind: "trojan", password: "" }),
  vmess: () => ({ ...base(443, createTransport()), kind: "vmess", uuid: "", alterId: 0, security: "auto" }),
  shadowsocks: () => ({
    ...base(8388, createTransport()),
    kind: "shadowsocks",
    method: "aes-128-gcm",
    password: "",
    plugin: "",
    uotVersion: 0
  }),
  socks: () => ({ ...base(1080, createTransport()), kind: "socks", version: "5", username: "", password: "" }),
  http: () => ({ ...base(443, createTransport()), kind: "http", username: "", password: "" })
}

export function createProfile<K extends ProxyKind>(kind: K): ProfileOf<K> {
  const make: () => ProfileOf<K> = factories[kind]
  return make()
}

export function isTransportNetwork(v: unknown): v is TransportNetwork {
  return NETWORKS.some((n) => n === v)
}

export function isIpAddress(host: string): boolean {
  return net.isIP(String(host || "").replace(/^\[|\]$/g, "")) !== 0
}

export function displayAddress(p: ProxyProfile): string {
  const host = p.serverAddress.includes(":") && !p.serverAddress.startsWith("[") ? `[${p.serverAddress}]` : p.serverAddress
  return `${host}:${p.serverPort}`
}

export function displayName(p: ProxyProfile): string {
  return p.name || displayAddress(p)
}

export function proxyTypeLabel(p: ProxyProfile): string {
  if (p.kind === "socks") return `socks${p.version}`
  return p.kind
}

export function cloneProfile<P extends ProxyProfile>(p: P): P {
  return structuredClone(p)
}
