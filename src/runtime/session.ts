import type { ProfileEntry } from "../profile/profile.schema.js"
import type { ProxyProfile } from "../profile/types.js"
import { compileOutbound } from "../proxy/outbound.js"
import { buildRunConfig, emptyLists, loadRoutingLists } from "../proxy/route.js"
import type { RunConfig } from "../proxy/singbox.js"
import type { Supervisor, SupervisorResult } from "../proxy/supervisor.js"
import type { VpnStatusProvider } from "../proxy/vpn.js"
import { withOverrides, type ProfileOverrides } from "../settings/settings.js"
import type { Settings } from "../settings/settings.schema.js"
import { createLogger } from "../utils/log.js"
import type { ProxyState } from "./state.js"

const log = createLogger("session")

export interface ConfigContext {
  settings: Settings
  vpnStatus: VpnStatusProvider
  /** Where custom-mode list files live. */
  listsDir: string
}

export type BuildResult = { ok: true; config: RunConfig } | { ok: false; error: string }

/** Compiles a profile and wraps it into a complete run config, applying per-profile overrides. */
export async function buildConfigFor(profile: ProxyProfile, ctx: ConfigContext, overrides?: ProfileOverrides): Promise<BuildResult> {
  const settings = withOverrides(ctx.settings, overrides)
  const { outbound, error } = compileOutbound(profile, settings.skipCert)
  if (!outbound) return { ok: false, error }
  const lists = settings.routing.mode === "custom" ? await loadRoutingLists(ctx.listsDir, settings.routing) : emptyLists()
  const config = await buildRunConfig(
    {
      outbound,
      routing: settings.routing,
      vpn: settings.vpn,
      dns: settings.dns,
      inbound: settings.inbound,
      lists,
      logLevel: settings.core.logLevel
    },
    ctx.vpnStatus
  )
  return { ok: true, config }
}

export type SessionEngine = Pick<Supervisor, "start" | "stop" | "setOnStop">

/**
 * Starts and stops the engine for one stored profile at a time and keeps
 * the shared `ProxyState` in step, including when the engine dies on its own.
 */
export class ProxySession {
  constructor(
    private readonly engine: SessionEngine,
    private readonly state: ProxyState,
    private readonly ctx: ConfigContext
  ) {
    engine.setOnStop(() => {
      if (this.state.isRunning) log.info(`profile ${this.state.currentProfileId ?? "?"} disconnected`)
      this.state.setStopped()
    })
  }

  async start(entry: Pick<ProfileEntry, "id" | "profile" | "overrides">): Promise<SupervisorResult> {
    const built = await buildConfigFor(entry.profile, this.ctx, entry.overrides)
    if (!built.ok) return { ok: false, kind: "StartFailed", message: built.error }
    if (this.state.isRunning) await this.stop()
    const result = await this.engine.start(built.config)
    if (result.ok) this.state.setRunning(entry.id)
    return result
  }

  async stop(): Promise<SupervisorResult> {
    const result = await this.engine.stop()
    this.state.setStopped()
    return result
  }
}
