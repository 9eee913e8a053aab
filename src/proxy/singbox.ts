// Subset of the sing-box configuration schema this project writes.

export interface SingboxTransport {
  type: "ws" | "http" | "grpc" | "httpupgrade" | "quic"
  path?: string
  host?: string | string[]
  method?: string
  headers?: Record<string, string | string[]>
  service_name?: string
  max_early_data?: number
  early_data_header_name?: string
}

export interface SingboxTls {
  enabled: true
  insecure?: boolean
  server_name?: string
  certificate?: string
  alpn?: string[]
  reality?: { enabled: true; public_key: string; short_id: string }
  utls?: { enabled: true; fingerprint: string }
}

interface ServerOutbound {
  tag?: string
  server: string
  server_port: number
}

export interface VlessOutbound extends ServerOutbound {
  type: "vless"
  uuid: string
  flow?: string
  packet_encoding: string
  transport?: SingboxTransport
  tls?: SingboxTls
}

export interface VmessOutbound extends ServerOutbound {
  type: "vmess"
  uuid: string
  security: string
  alter_id: number
  packet_encoding: string
  transport?: SingboxTransport
  tls?: SingboxTls
}

export interface TrojanOutbound extends ServerOutbound {
  type: "trojan"
  password: string
  transport?: SingboxTransport
  tls?: SingboxTls
}

export interface ShadowsocksOutbound extends ServerOutbound {
  type: "shadowsocks"
  method: string
  password: string
  udp_over_tcp: false | { enabled: true; version: number }
  plugin?: string
  plugin_opts?: string
}

export interface SocksOutbound extends ServerOutbound {
  type: "socks"
  version?: "4" | "4a"
  username?: string
  password?: string
}

export interface HttpOutbound extends ServerOutbound {
  type: "http"
  username?: string
  password?: string
  tls?: SingboxTls
}

export type ProxyOutbound =
  | VlessOutbound
  | VmessOutbound
  | TrojanOutbound
  | ShadowsocksOutbound
  | SocksOutbound
  | HttpOutbound

export interface DirectOutbound {
  type: "direct"
  tag: string
  bind_interface?: string
}

export type Outbound = ProxyOutbound | DirectOutbound

export interface RouteRule {
  ip_cidr?: string[]
  domain_suffix?: string[]
  outbound: string
}

export interface DnsServer {
  tag: string
  type: "local" | "https" | "tls" | "udp" | "tcp"
  server?: string
  server_port?: number
  path?: string
  detour?: string
}

export interface DnsRule {
  domain?: string[]
  domain_suffix?: string[]
  server: string
}

export interface MixedInbound {
  type: "mixed"
  tag: string
  listen: string
  listen_port: number
  sniff?: boolean
}

export interface RunConfig {
  log: { level: string; timestamp: boolean; output?: string }
  dns: { servers: DnsServer[]; rules: DnsRule[]; final: string }
  inbounds: MixedInbound[]
  outbounds: Outbound[]
  route: { rules: RouteRule[]; final: string; auto_detect_interface: boolean }
  experimental?: {
    clash_api?: { external_controller: string; secret: string }
  }
}
