export * from "./profile/types.js"
export { ProfileStore, DEFAULT_GROUP_ID } from "./profile/store.js"
export type { ProfileEntry, ProfileGroup } from "./profile/profile.schema.js"
export { parseLink, serializeLink, detectLinkType, parseSubscriptionContent, type SerializeOptions } from "./link/index.js"
export { compileOutbound, type CompileResult } from "./proxy/outbound.js"
export { compileTransport, compileTls } from "./proxy/transport.js"
export type * from "./proxy/singbox.js"
export { buildRunConfig, loadRoutingLists, parseRouteEntries, type AssembleInput, type RoutingLists } from "./proxy/route.js"
export { buildDnsBlock, parseDnsServer, DNS_TAGS } from "./proxy/dns.js"
export {
  Supervisor,
  type SupervisorOptions,
  type SupervisorResult,
  type SupervisorState,
  type SupervisorFailureKind
} from "./proxy/supervisor.js"
export { ClashApiClient, type Connection, type EngineVersion, type LogLine, type TrafficStats } from "./proxy/clash-api.js"
export { findCoreBinary, coreArgs, CORE_BINARY_NAME } from "./proxy/core.js"
export { NmcliVpnStatus, type VpnStatusProvider } from "./proxy/vpn.js"
export { fetchSubscription, updateSubscription, type FetchSubscriptionOptions } from "./proxy/subscription.js"
export { ProxyState, type ProxyStatus } from "./runtime/state.js"
export { ConnectionMonitor, type ConnectionStatus } from "./runtime/monitor.js"
export { ProxySession, buildConfigFor } from "./runtime/session.js"
export { loadSettings, parseSettings, defaultSettings, withOverrides, type ProfileOverrides } from "./settings/settings.js"
export type { Settings } from "./settings/settings.schema.js"
