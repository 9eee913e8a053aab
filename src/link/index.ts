import { PROXY_KINDS, type ProfileOf, type ProxyKind, type ProxyProfile } from "../profile/types.js"
import { createLogger } from "../utils/log.js"
import { decodeBase64, schemeOf, stripBom } from "./encoding.js"
import { parseShadowsocks, serializeShadowsocks } from "./shadowsocks.js"
import { parseHttp, parseSocks, serializeHttp, serializeSocks } from "./socks-http.js"
import { parseTrojan, parseVless, serializeTrojan, serializeVless } from "./vless-trojan.js"
import { parseVmess, serializeVmess } from "./vmess.js"

const log = createLogger("codec")

export interface SerializeOptions {
  /** Write VMess in the base64-JSON form older clients expect. */
  legacyVmess?: boolean
}

interface LinkCodec<K extends ProxyKind> {
  schemes: readonly string[]
  parse(link: string): ProfileOf<K> | null
  serialize(profile: ProfileOf<K>, opts: SerializeOptions): string
}

const codecs: { [K in ProxyKind]: LinkCodec<K> } = {
  vless: { schemes: ["vless"], parse: parseVless, serialize: (p) => serializeVless(p) },
  trojan: { schemes: ["trojan"], parse: parseTrojan, serialize: (p) => serializeTrojan(p) },
  vmess: {
    schemes: ["vmess"],
    parse: parseVmess,
    serialize: (p, opts) => serializeVmess(p, { legacy: Boolean(opts.legacyVmess) })
  },
  shadowsocks: { schemes: ["ss"], parse: parseShadowsocks, serialize: (p) => serializeShadowsocks(p) },
  socks: { schemes: ["socks", "socks4", "socks4a", "socks5"], parse: parseSocks, serialize: (p) => serializeSocks(p) },
  http: { schemes: ["http", "https"], parse: parseHttp, serialize: (p) => serializeHttp(p) }
}

const kindByScheme = new Map<string, ProxyKind>()
for (const kind of PROXY_KINDS) {
  for (const scheme of codecs[kind].schemes) kindByScheme.set(scheme, kind)
}

export function detectLinkType(text: string): ProxyKind | null {
  return kindByScheme.get(schemeOf(text)) ?? null
}

function parseAs<K extends ProxyKind>(kind: K, link: string): ProxyProfile | null {
  const codec: LinkCodec<K> = codecs[kind]
  return codec.parse(link)
}

function serializeAs<K extends ProxyKind>(kind: K, profile: ProfileOf<K>, opts: SerializeOptions): string {
  const codec: LinkCodec<K> = codecs[kind]
  return codec.serialize(profile, opts)
}

/**
 * Parses one share link. An unknown scheme or a structurally broken link
 * yields null; nothing is thrown.
 */
export function parseLink(text: string): ProxyProfile | null {
  const link = String(text || "").trim()
  const kind = detectLinkType(link)
  if (!kind) return null
  try {
    return parseAs(kind, link)
  } catch (e) {
    log.debug(`${kind} link rejected: ${e instanceof Error ? e.message : String(e)}`)
    return null
  }
}

export function serializeLink(profile: ProxyProfile, opts: SerializeOptions = {}): string {
  return serializeAs(profile.kind, profile, opts)
}

function maybeDecodeBody(text: string): string {
  const body = stripBom(String(text || "")).trim()
  if (!body || body.includes("://")) return body
  const decoded = decodeBase64(body)
  return decoded && decoded.includes("://") ? decoded : body
}

/**
 * Parses a subscription body: one base64 blob or newline-delimited links.
 * Blank lines, `#` comments and links that fail to parse are skipped.
 */
export function parseSubscriptionContent(text: string): ProxyProfile[] {
  const body = maybeDecodeBody(text)
  const out: ProxyProfile[] = []
  let skipped = 0
  for (const raw of body.split(/\r?\n/)) {
    const line = raw.trim()
    if (!line || line.startsWith("#")) continue
    const profile = parseLink(line)
    if (profile) out.push(profile)
    else skipped++
  }
  if (skipped) log.debug(`subscription: ${out.length} parsed, ${skipped} skipped`)
  return out
}
