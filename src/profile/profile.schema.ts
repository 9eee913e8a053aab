import { z } from "zod"
import { RoutingSettingsSchema, VpnSettingsSchema } from "../settings/settings.schema.js"
import { NETWORKS } from "./types.js"

export const TransportSettingsSchema = z.object({
  network: z.enum(NETWORKS).default("tcp"),
  security: z.enum(["", "tls", "reality"]).default(""),
  path: z.string().default(""),
  host: z.string().default(""),
  headerType: z.string().default(""),
  sni: z.string().default(""),
  alpn: z.string().default(""),
  allowInsecure: z.boolean().default(false),
  certificate: z.string().default(""),
  utlsFingerprint: z.string().default(""),
  reality: z
    .object({
      publicKey: z.string().default(""),
      shortId: z.string().default(""),
      spiderX: z.string().default("")
    })
    .default({}),
  wsEarlyData: z
    .object({
      length: z.number().int().min(0).default(0),
      headerName: z.string().default("Sec-WebSocket-Protocol")
    })
    .default({}),
  packetEncoding: z.string().default("xudp")
})

const base = {
  name: z.string().default(""),
  serverAddress: z.string(),
  serverPort: z.number().int().min(1).max(65535),
  id: z.number().int().default(-1),
  groupId: z.number().int().default(0),
  transport: TransportSettingsSchema.default({})
}

export const ProxyProfileSchema = z.discriminatedUnion("kind", [
  z.object({ ...base, kind: z.literal("vless"), uuid: z.string(), flow: z.string().default(""), encryption: z.string().default("none") }),
  z.object({ ...base, kind: z.literal("trojan"), password: z.string() }),
  z.object({
    ...base,
    kind: z.literal("vmess"),
    uuid: z.string(),
    alterId: z.number().int().min(0).default(0),
    security: z.string().default("auto")
  }),
  z.object({
    ...base,
    kind: z.literal("shadowsocks"),
    method: z.string(),
    password: z.string(),
    plugin: z.string().default(""),
    uotVersion: z.number().int().min(0).default(0)
  }),
  z.object({
    ...base,
    kind: z.literal("socks"),
    version: z.enum(["4", "4a", "5"]).default("5"),
    username: z.string().default(""),
    password: z.string().default("")
  }),
  z.object({ ...base, kind: z.literal("http"), username: z.string().default(""), password: z.string().default("") })
])

export const ProfileOverridesSchema = z.object({
  routing: RoutingSettingsSchema.partial().optional(),
  vpn: VpnSettingsSchema.partial().optional()
})

export const ProfileEntrySchema = z.object({
  id: z.number().int().min(1),
  groupId: z.number().int().min(0),
  profile: ProxyProfileSchema,
  /** -1 until measured. */
  latencyMs: z.number().default(-1),
  /** Epoch ms; 0 when never used. */
  lastUsed: z.number().default(0),
  overrides: ProfileOverridesSchema.optional()
})

export const ProfileGroupSchema = z.object({
  id: z.number().int().min(0),
  name: z.string(),
  isSubscription: z.boolean().default(false),
  subscriptionUrl: z.string().default(""),
  /** Epoch ms of the last successful subscription update. */
  lastUpdated: z.number().default(0),
  /** Raw `subscription-userinfo` header from the last update. */
  subUserInfo: z.string().default("")
})

export const StoreMetaSchema = z.object({
  version: z.literal(1).default(1),
  nextProfileId: z.number().int().min(1).default(1),
  nextGroupId: z.number().int().min(1).default(1),
  currentGroupId: z.number().int().min(0).default(0)
})

/** Entries are validated one by one so a bad record does not sink the file. */
export const StoreSnapshotSchema = z.object({
  meta: StoreMetaSchema.default({}),
  groups: z.array(z.unknown()).default([]),
  profiles: z.array(z.unknown()).default([])
})

export type ProfileEntry = z.output<typeof ProfileEntrySchema>
export type ProfileGroup = z.output<typeof ProfileGroupSchema>
export type StoreMeta = z.output<typeof StoreMetaSchema>
